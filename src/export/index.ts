export { sanitizeLpName, writeLp } from "./lp-writer";
export { solutionToString } from "./solution-text";
