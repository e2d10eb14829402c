export { type PathStep, pathStep, stepsEqual } from "./path-step";
export { TraversalPath } from "./traversal-path";
