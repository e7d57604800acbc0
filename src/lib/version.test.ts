import { describe, expect, it } from "vitest";
import { VersionError } from "../errors";
import {
	compareVersion,
	getLatestVersion,
	normalizeVersion,
	sortVersionsDescending,
} from "./version";

describe("version utilities", () => {
	describe("normalizeVersion", () => {
		it("should prepend the version marker", () => {
			expect(normalizeVersion("1.2.0")).toBe("v1.2.0");
		});

		it("should keep an existing marker", () => {
			expect(normalizeVersion("v0.4.1")).toBe("v0.4.1");
		});

		it("should pad shorthand versions", () => {
			expect(normalizeVersion("v1")).toBe("v1.0.0");
			expect(normalizeVersion("1.2")).toBe("v1.2.0");
		});

		it("should keep prerelease tags", () => {
			expect(normalizeVersion("2.0.0-rc.1")).toBe("v2.0.0-rc.1");
		});

		it("should reject empty input", () => {
			expect(() => normalizeVersion("")).toThrow(VersionError);
			expect(() => normalizeVersion("   ")).toThrow("version cannot be empty");
		});

		it("should reject malformed input", () => {
			expect(() => normalizeVersion("latest")).toThrow(VersionError);
			expect(() => normalizeVersion("vv1.0.0")).toThrow(VersionError);
			expect(() => normalizeVersion("1.0.0.0")).toThrow(VersionError);
		});
	});

	describe("compareVersion", () => {
		it("should report a newer version", () => {
			expect(compareVersion("1.2.0", "1.1.9")).toBe(true);
		});

		it("should not report an equal version as newer", () => {
			expect(compareVersion("1.0.0", "1.0.0")).toBe(false);
			expect(compareVersion("v1.0.0", "1.0.0")).toBe(false);
		});

		it("should not report an older version as newer", () => {
			expect(compareVersion("0.9.0", "1.0.0")).toBe(false);
		});

		it("should order a release after its prerelease", () => {
			expect(compareVersion("1.0.0", "1.0.0-beta.2")).toBe(true);
		});

		it("should throw VersionError for empty input", () => {
			expect(() => compareVersion("", "1.0.0")).toThrow(VersionError);
		});
	});

	describe("getLatestVersion", () => {
		it("should return highest version", () => {
			expect(getLatestVersion(["0.1.0", "0.2.2", "0.2.0"])).toBe("0.2.2");
		});

		it("should return null for empty list", () => {
			expect(getLatestVersion([])).toBeNull();
		});

		it("should filter invalid versions", () => {
			expect(getLatestVersion(["1.0.0", "invalid", "2.0.0"])).toBe("2.0.0");
		});
	});

	describe("sortVersionsDescending", () => {
		it("should sort newest first and keep invalid entries last", () => {
			expect(sortVersionsDescending(["0.1.0", "draft", "1.0.0", "0.3.1"])).toEqual(
				["1.0.0", "0.3.1", "0.1.0", "draft"],
			);
		});
	});
});
