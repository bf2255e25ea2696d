export { includeCandidates, readSourceFromDisk, type ReadSource } from "./files.js";
