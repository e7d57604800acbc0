#!/usr/bin/env node

import { Command } from "commander";
import {
	bundle,
	configShow,
	deps,
	get,
	info,
	list,
	login,
	logout,
	push,
	remove,
	search,
	update,
} from "./commands/index";
import { formatVersion } from "./updater";

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

const program = new Command();

program
	.name("typkg")
	.description("Command-line client for the Typst package registry")
	.version(formatVersion());

// =============================================================================
// Config commands
// =============================================================================

const configCmd = program
	.command("config")
	.description("Manage typkg configuration");

configCmd
	.command("show")
	.description("Show resolved configuration")
	.action(async () => {
		await configShow();
	});

// =============================================================================
// Authentication commands
// =============================================================================

program
	.command("login")
	.description("Store a registry access token")
	.option("--token <token>", "Access token created on the registry website")
	.action(async (options) => {
		await login({ token: options.token });
	});

program
	.command("logout")
	.description("Clear the stored access token")
	.action(async () => {
		await logout();
	});

// =============================================================================
// Registry commands
// =============================================================================

program
	.command("search <query>")
	.description("Search for packages")
	.option("-n, --namespace <namespace>", "Filter by namespace")
	.option("-l, --limit <limit>", "Maximum number of results", "20")
	.action(async (query: string, options) => {
		await search(query, {
			namespace: options.namespace,
			limit: options.limit,
		});
	});

program
	.command("info <package>")
	.description("Show package details (e.g., @preview/cetz)")
	.action(async (specifier: string) => {
		await info(specifier);
	});

program
	.command("get <package>")
	.description(
		"Download a package and its dependencies into the cache (e.g., @preview/cetz:0.2.2)",
	)
	.option("--no-deps", "Skip dependency resolution")
	.action(async (specifier: string, options) => {
		await get(specifier, { deps: options.deps });
	});

program
	.command("deps <directory>")
	.description("Download every package imported by a local Typst project")
	.action(async (directory: string) => {
		await deps(directory);
	});

program
	.command("bundle <directory>")
	.description("Create a .tar.gz package from a directory with a typst.toml")
	.option("-o, --output <path>", "Output file (default: <directory>.tar.gz)")
	.option(
		"-e, --exclude <pattern>",
		"Additional files or directories to exclude (repeatable)",
		collect,
		[],
	)
	.action(async (directory: string, options) => {
		await bundle(directory, {
			output: options.output,
			exclude: options.exclude,
		});
	});

program
	.command("push <file> <namespace>")
	.description("Upload a package archive to the registry")
	.action(async (file: string, namespace: string) => {
		await push(file, namespace);
	});

// =============================================================================
// Cache commands
// =============================================================================

program
	.command("list")
	.alias("ls")
	.description("List cached packages")
	.option("--json", "Output as JSON")
	.action(async (options) => {
		await list({ json: options.json });
	});

program
	.command("remove <package>")
	.alias("rm")
	.description("Remove a cached package (e.g., @preview/cetz:0.2.2)")
	.action(async (specifier: string) => {
		await remove(specifier);
	});

// =============================================================================
// Self-update
// =============================================================================

program
	.command("update")
	.description("Update typkg to the latest release")
	.option("--check", "Only check whether an update is available")
	.option("-y, --yes", "Install without asking")
	.action(async (options) => {
		await update({ check: options.check, yes: options.yes });
	});

await program.parseAsync();
