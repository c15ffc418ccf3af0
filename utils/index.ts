export { extractErrorCode, reasonFromCode, writeFileAtomic } from "./file-utils.js";
