export { fingerprint, murmurHash3 } from "./murmur-hash.js";
