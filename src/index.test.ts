import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { FileError, fromCsv, total } from './index.js';

describe('fromCsv', () => {
  const dir = mkdtempSync(join(tmpdir(), 'ledger-index-'));
  const path = join(dir, 'export.csv');

  beforeAll(() => {
    writeFileSync(
      path,
      [
        'Date,Description,Original Description,Amount,Transaction Type,Category,Account Name,Labels,Notes',
        '01/01/2023,Coffee,,3.50,debit,Food,Checking,,',
        '01/02/2023,Paycheck,,1000.00,credit,Income,Checking,,',
        '01/02/2023,Card payment,,40.00,debit,Transfer,Checking,,',
      ].join('\n'),
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a Mint export without transfers', () => {
    const history = fromCsv(path);

    expect(history.length).toBe(2);
    expect(total(history.debits()).toFixed(2)).toBe('-3.50');
  });

  it('includes transfers on request', () => {
    expect(fromCsv(path, { includeTransfers: true }).length).toBe(3);
  });

  it('surfaces missing files as FileError', () => {
    expect(() => fromCsv(join(dir, 'nope.csv'))).toThrow(FileError);
  });
});
