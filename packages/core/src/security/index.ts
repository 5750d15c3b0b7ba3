export { canonicalizePath, isContained, isSafePath, validatePath } from "./path-validator.js";
