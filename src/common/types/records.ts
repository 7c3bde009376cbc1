/**
 * Canonical analytics records shared by ingestion and the hybrid store.
 */

/** Scalar stored in the OpEx attribute bag */
export type AttributeValue = string | number | boolean | null;

/** Open-ended extension fields not covered by the fixed columns */
export type AttributeBag = Readonly<Record<string, AttributeValue>>;

/** Unit of the OpEx cost measures */
export type OpexDataType = 'dollar' | 'mm';

/**
 * One OpEx ledger line (`opex_data_hybrid`).
 */
export interface FinancialRecord {
  readonly kind: 'opex';
  /** Content-derived identity, UUID formatted */
  readonly uuid: string;
  readonly sourceFile: string | null;
  readonly sourceSheet: string | null;
  readonly dataType: OpexDataType;
  readonly fiscalYear: number;
  readonly projectNumber: number;
  readonly deptLead: string | null;
  readonly hwSw: string | null;
  readonly plannedCost: number | null;
  readonly actualCost: number | null;
  readonly attributes: AttributeBag;
}

/**
 * One demand measurement (`bpafg_demand`), unique per
 * (project, resource, country, demand type, month).
 */
export interface DemandRecord {
  readonly kind: 'demand';
  readonly recordKey: string;
  readonly resourceName: string;
  readonly projectName: string;
  readonly taskName: string | null;
  readonly homegroup: string | null;
  readonly resourceSecurityGroup: string | null;
  readonly primaryBl: string | null;
  readonly deptCountry: string | null;
  readonly demandType: string | null;
  /** YYYY-MM */
  readonly month: string;
  readonly value: number;
  readonly sourceFile: string | null;
}

/**
 * One project priority row (`priority_template`), unique per (project, country, month).
 */
export interface PriorityRecord {
  readonly kind: 'priority';
  readonly recordKey: string;
  readonly project: string;
  readonly priority: number;
  readonly country: string | null;
  readonly targetCapacity: number | null;
  readonly countryCost: number | null;
  /** YYYY-MM, null for rows without a month dimension */
  readonly month: string | null;
  readonly monthlyCapacity: number | null;
  readonly sourceFile: string | null;
}

/**
 * An OpEx record ready for the store, with its embedding.
 */
export interface EmbeddedFinancialRecord {
  readonly kind: 'opex';
  readonly record: FinancialRecord;
  readonly embedding: readonly number[];
}
