export { configShow } from "./show";
