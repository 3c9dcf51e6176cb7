export { emit, fileEditId, formatEnvironment, type EmitOptions, type EmitResult, type EnvironmentFormat } from "./emit.js";
export { applyFileEdits, revertFileEdits, BACKUP_SUFFIX, type AppliedEdit, type FileEditResult } from "./files.js";
