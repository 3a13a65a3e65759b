/**
 * @bulwark/functional - the Result outcome value
 */

export { Result } from "./result.mjs";
