export type LeadSource = "session";

export interface LeadRecord {
  readonly id: string;
  readonly email: string;
  readonly sessionId: string;
  readonly capturedAt: string;
  readonly source: LeadSource;
  readonly ip?: string;
}

export interface AppendLeadInput {
  readonly email: string;
  readonly sessionId: string;
  readonly capturedAt: string;
  readonly ip?: string;
}
