/**
 * Flat column view of canonical records, keyed by database column name.
 */

import type { StorableRecord } from './types.js';
import type {
  AttributeBag,
  AttributeValue,
  DemandRecord,
  FinancialRecord,
  PriorityRecord,
} from '../../../common/types/records.js';
import type { TableName } from '../../labels/index.js';

export interface StoredRow {
  readonly table: TableName;
  readonly identity: string;
  readonly columns: Readonly<Record<string, AttributeValue>>;
  readonly attributes: AttributeBag;
}

const EMPTY_BAG: AttributeBag = Object.freeze({});

export const opexColumns = (record: FinancialRecord): Record<string, AttributeValue> => ({
  uuid: record.uuid,
  source_file: record.sourceFile,
  source_sheet: record.sourceSheet,
  data_type: record.dataType,
  fiscal_year: record.fiscalYear,
  project_number: record.projectNumber,
  dept_lead: record.deptLead,
  hw_sw: record.hwSw,
  planned_cost: record.plannedCost,
  actual_cost: record.actualCost,
});

export const demandColumns = (record: DemandRecord): Record<string, AttributeValue> => ({
  record_key: record.recordKey,
  resource_name: record.resourceName,
  project_name: record.projectName,
  task_name: record.taskName,
  homegroup: record.homegroup,
  resource_security_group: record.resourceSecurityGroup,
  primary_bl: record.primaryBl,
  dept_country: record.deptCountry,
  demand_type: record.demandType,
  month: record.month,
  value: record.value,
  source_file: record.sourceFile,
});

export const priorityColumns = (record: PriorityRecord): Record<string, AttributeValue> => ({
  record_key: record.recordKey,
  project: record.project,
  priority: record.priority,
  country: record.country,
  target_capacity: record.targetCapacity,
  country_cost: record.countryCost,
  month: record.month,
  monthly_capacity: record.monthlyCapacity,
  source_file: record.sourceFile,
});

export const tableOf = (record: StorableRecord): TableName => {
  switch (record.kind) {
    case 'opex':
      return 'opex_data_hybrid';
    case 'demand':
      return 'bpafg_demand';
    case 'priority':
      return 'priority_template';
  }
};

export const identityOf = (record: StorableRecord): string =>
  record.kind === 'opex' ? record.record.uuid : record.recordKey;

export const toStoredRow = (record: StorableRecord): StoredRow => {
  switch (record.kind) {
    case 'opex':
      return {
        table: 'opex_data_hybrid',
        identity: record.record.uuid,
        columns: opexColumns(record.record),
        attributes: record.record.attributes,
      };
    case 'demand':
      return {
        table: 'bpafg_demand',
        identity: record.recordKey,
        columns: demandColumns(record),
        attributes: EMPTY_BAG,
      };
    case 'priority':
      return {
        table: 'priority_template',
        identity: record.recordKey,
        columns: priorityColumns(record),
        attributes: EMPTY_BAG,
      };
  }
};
