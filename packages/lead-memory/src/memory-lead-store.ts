import { randomUUID } from "node:crypto";

import {
  ok,
  type AppendLeadInput,
  type LeadRecord,
  type LeadStorePort,
  type Result,
  type ShellpassError,
} from "@shellpass/contracts";

type IdFactory = () => string;

export interface MemoryLeadStoreOptions {
  readonly idFactory?: IdFactory;
  readonly initialLeads?: ReadonlyArray<LeadRecord>;
}

const defaultIdFactory: IdFactory = () => randomUUID();

const cloneLead = (lead: LeadRecord): LeadRecord => ({ ...lead });

export class MemoryLeadStore implements LeadStorePort {
  private readonly leads: LeadRecord[];
  private readonly idFactory: IdFactory;

  constructor(options: MemoryLeadStoreOptions = {}) {
    this.idFactory = options.idFactory ?? defaultIdFactory;
    this.leads = (options.initialLeads ?? []).map(cloneLead);
  }

  async append(input: AppendLeadInput): Promise<Result<LeadRecord, ShellpassError>> {
    const lead: LeadRecord = {
      id: this.idFactory(),
      email: input.email,
      sessionId: input.sessionId,
      capturedAt: input.capturedAt,
      source: "session",
      ...(input.ip ? { ip: input.ip } : {}),
    };
    this.leads.push(lead);
    return ok(cloneLead(lead));
  }

  async list(): Promise<Result<ReadonlyArray<LeadRecord>, ShellpassError>> {
    return ok(this.leads.map(cloneLead));
  }
}

export const createMemoryLeadStore = (options?: MemoryLeadStoreOptions): MemoryLeadStore =>
  new MemoryLeadStore(options);
