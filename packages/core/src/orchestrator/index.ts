export { run, type RunDependencies } from "./run.js";
export { defaultPackageInput, detectPackages } from "./detect.js";
export {
  OUTPUT_FILE_NAME,
  findCollisions,
  mergeOutcomes,
  readRequestOutput,
  writeRequestOutput,
  type InputOutcome,
  type MergeConflict,
  type MergedOutput,
} from "./output.js";
