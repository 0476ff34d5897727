// Data structures
export { HashSet } from "./hash-set.js";
