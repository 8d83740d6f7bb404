/**
 * Result types shared by the engine and the command surface.
 */

/** Integer status every command returns. */
export const Status = {
  Ok: 0,
  Failed: -1,
  AlreadyExists: -2,
  NotFound: -3,
} as const;

export type Status = (typeof Status)[keyof typeof Status];

export type ModuleResult = "created" | "exists" | "missing" | "failed";

export interface ModuleOutcome {
  module: string;
  result: ModuleResult;
  /** SQL file executed, or the path that was checked for a missing module. */
  file: string;
  /** Objects granted to the application user after creation. */
  grants: string[];
  error?: string;
}

/** Result of one schema application run. */
export interface ApplyReport {
  status: "ok" | "failed";
  modules: ModuleOutcome[];
  error?: string;
}
