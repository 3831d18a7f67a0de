/**
 * Index of a module in the compilation's module registry. The registry itself
 * lives outside the identifier store; only the numbering is shared.
 */
export type ModuleIdx = number;

/** The module currently being compiled. */
export const PRIMARY_MODULE_IDX: ModuleIdx = 0;
