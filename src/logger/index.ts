export { log } from "./logger";
