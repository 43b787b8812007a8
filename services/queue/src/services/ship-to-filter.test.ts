import { describe, expect, it } from 'vitest';
import { applyShipToFilter } from './ship-to-filter.js';
import type { WorkOrderRecord } from './work-order.types.js';

function order(workOrderNo: string, shipTo: string | null): WorkOrderRecord {
  return {
    workOrderNo,
    custId: null,
    woName: null,
    shipTo,
    firmRush: false,
    rush: false,
    dateIn: '2024-01-01',
    dateRequired: null,
    dateCompleted: null,
    position: null,
  };
}

const orders = [order('WO1', 'Main Plant'), order('WO2', ' warehouse b '), order('WO3', null)];
const ids = (list: WorkOrderRecord[]) => list.map((o) => o.workOrderNo);

describe('applyShipToFilter', () => {
  it('hides listed ship-to names in deny mode, ignoring case and whitespace', () => {
    const result = applyShipToFilter(orders, { mode: 'deny', values: ['Warehouse B'] }, false);
    expect(ids(result)).toEqual(['WO1', 'WO3']);
  });

  it('keeps only listed ship-to names in allow mode', () => {
    const result = applyShipToFilter(orders, { mode: 'allow', values: ['WAREHOUSE B'] }, false);
    expect(ids(result)).toEqual(['WO2']);
  });

  it('returns every order when the list is empty', () => {
    expect(ids(applyShipToFilter(orders, { mode: 'allow', values: [] }, false))).toEqual([
      'WO1',
      'WO2',
      'WO3',
    ]);
  });

  it('returns every order when the excluded group is requested', () => {
    const result = applyShipToFilter(orders, { mode: 'deny', values: ['Warehouse B'] }, true);
    expect(ids(result)).toEqual(['WO1', 'WO2', 'WO3']);
  });
});
