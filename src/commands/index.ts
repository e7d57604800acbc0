export { type BundleCommandOptions, bundle } from "./bundle";
export { configShow } from "./config/index";
export { deps } from "./deps";
export { type GetOptions, get } from "./get";
export { info } from "./info";
export { type ListOptions, list } from "./list";
export { type LoginOptions, login } from "./login";
export { logout } from "./logout";
export { push } from "./push";
export { remove } from "./remove";
export { type SearchOptions, search } from "./search";
export { type UpdateOptions, update } from "./update";
