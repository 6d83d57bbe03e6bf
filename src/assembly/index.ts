export { assemble, assembleToFile, resolveIncludePath, DEFAULT_MAX_DEPTH } from "./resolver";
export type {
  AssemblyMode,
  AssemblyOptions,
  AssemblyResult,
  AssemblyDiagnostic,
  AssemblyDiagnosticType,
} from "./resolver";
