import type { ShellpassError } from "../../types/domain-error.js";
import type { AppendLeadInput, LeadRecord } from "../../types/lead.js";
import type { Result } from "../../types/result.js";

export interface LeadStorePort {
  append(input: AppendLeadInput): Promise<Result<LeadRecord, ShellpassError>>;
  list(): Promise<Result<ReadonlyArray<LeadRecord>, ShellpassError>>;
}
