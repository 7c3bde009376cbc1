import type { ColumnType, Generated, JSONColumnType } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;
// Database-defaulted timestamp: optional on insert
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

// NUMERIC and BIGINT come back from pg as strings; numbers are accepted on write
export type Numeric = ColumnType<string, number | string, number | string>;
export type NullableNumeric = ColumnType<string | null, number | string | null, number | string | null>;

// OpEx ledger lines with their embedding
export interface OpexDataHybrid {
  uuid: string;
  source_file: string | null;
  source_sheet: string | null;
  data_type: string;
  fiscal_year: number;
  project_number: Numeric;
  dept_lead: string | null;
  hw_sw: string | null;
  planned_cost: NullableNumeric;
  actual_cost: NullableNumeric;
  additional_data: JSONColumnType<Record<string, unknown>>;
  // pgvector text form, e.g. "[0.1,0.2]"
  vector: string;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

// Headcount demand, one row per key tuple and month
export interface BpafgDemand {
  record_key: string;
  resource_name: string;
  project_name: string;
  task_name: string | null;
  homegroup: string | null;
  resource_security_group: string | null;
  primary_bl: string | null;
  dept_country: string | null;
  demand_type: string | null;
  month: string;
  value: Numeric;
  source_file: string | null;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

// Project priority and capacity per country and month
export interface PriorityTemplate {
  record_key: string;
  project: string;
  priority: number;
  country: string | null;
  target_capacity: NullableNumeric;
  country_cost: NullableNumeric;
  month: string | null;
  monthly_capacity: NullableNumeric;
  source_file: string | null;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface ChatSessions {
  session_id: Generated<string>; // UUID
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
  summary: string | null;
  extra: JSONColumnType<Record<string, unknown>> | null;
}

export interface ChatMessages {
  id: Generated<string>; // BIGSERIAL -> string
  session_id: string;
  role: string;
  content: string;
  created_at: GeneratedTimestamp;
  extra: JSONColumnType<Record<string, unknown>> | null;
}

// Note: keys are lowercase to match PostgreSQL identifier folding.
export interface FiraDatabase {
  opex_data_hybrid: OpexDataHybrid;
  bpafg_demand: BpafgDemand;
  priority_template: PriorityTemplate;
  chat_sessions: ChatSessions;
  chat_messages: ChatMessages;
}
