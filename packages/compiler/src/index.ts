export * from "./ident/index.js";
export * from "./diagnostics/index.js";
export * from "./modules/ids.js";
export {
  COMPILER_PERF_ENV,
  compilerPerfCounters,
  isCompilerPerfEnabled,
} from "./perf.js";
