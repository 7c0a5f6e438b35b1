import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  CsvStructureError,
  SourceReadError,
  ValidationError,
  type DomainError,
  type TransactionRecord,
} from '@payledger/core';
import type { Result } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { readTransactionRecords } from './transaction-record-source.js';

async function collect(filePath: string): Promise<Result<TransactionRecord, DomainError>[]> {
  const results: Result<TransactionRecord, DomainError>[] = [];
  for await (const result of readTransactionRecords(filePath)) {
    results.push(result);
  }
  return results;
}

describe('readTransactionRecords', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'payledger-source-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeCsv(name: string, content: string): Promise<string> {
    const csvPath = path.join(tmpDir, name);
    await fs.writeFile(csvPath, content);
    return csvPath;
  }

  it('should yield records in file order with whitespace trimmed', async () => {
    const csvPath = await writeCsv(
      'transactions.csv',
      'type, client, tx, amount\ndeposit, 1, 1, 1.0\nwithdrawal,  1, 2,  0.5\ndispute, 1, 1,\nresolve, 1, 1\n'
    );

    const results = await collect(csvPath);

    expect(results.every((result) => result.isOk())).toBe(true);
    const records = results.flatMap((result) => (result.isOk() ? [result.value] : []));
    expect(records.map((record) => [record.kind, record.clientId, record.txId, record.amount.toDecimalString()])).toEqual([
      ['deposit', 1, 1, '1.0000'],
      ['withdrawal', 1, 2, '0.5000'],
      ['dispute', 1, 1, '0.0000'],
      ['resolve', 1, 1, '0.0000'],
    ]);
  });

  it('should strip a byte-order mark and skip empty lines', async () => {
    const csvPath = await writeCsv('bom.csv', '\uFEFFtype,client,tx,amount\n\ndeposit,3,4,2\n\n');

    const results = await collect(csvPath);

    expect(results).toHaveLength(1);
    expect(results[0]?._unsafeUnwrap().clientId).toBe(3);
  });

  it('should yield nothing for a header-only file', async () => {
    const csvPath = await writeCsv('empty.csv', 'type,client,tx,amount\n');

    expect(await collect(csvPath)).toEqual([]);
  });

  it('should yield malformed rows as errors and keep reading', async () => {
    const csvPath = await writeCsv('mixed.csv', 'type,client,tx,amount\ndeposit,1,1,1\nwithdraw,1,2,1\ndeposit,1,3,2\n');

    const results = await collect(csvPath);

    expect(results).toHaveLength(3);
    expect(results[0]?.isOk()).toBe(true);
    expect(results[2]?.isOk()).toBe(true);

    const error = results[1]?._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ValidationError);
    expect(error?.message).toBe(`Malformed row at ${csvPath}:3: type: Unrecognized transaction type "withdraw"`);
  });

  it('should yield a single read error for a missing file', async () => {
    const missing = path.join(tmpDir, 'missing.csv');

    const results = await collect(missing);

    expect(results).toHaveLength(1);
    const error = results[0]?._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(SourceReadError);
    expect(error?.code).toBe('SOURCE_READ_ERROR');
    expect(error?.source).toBe(missing);
    expect(error?.context).toEqual({ errorCode: 'ENOENT' });
  });

  it('should end with a structure error on broken CSV structure', async () => {
    const csvPath = await writeCsv('broken.csv', 'type,client,tx,amount\ndeposit,1,1,"1.0\n');

    const results = await collect(csvPath);

    expect(results).toHaveLength(1);
    const error = results[0]?._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(CsvStructureError);
    expect(error?.code).toBe('CSV_STRUCTURE_ERROR');
    expect(error?.message.startsWith(`Malformed CSV in ${csvPath}:`)).toBe(true);
  });

  it('should stop reading when the consumer stops early', async () => {
    const csvPath = await writeCsv('long.csv', 'type,client,tx,amount\ndeposit,1,1,1\ndeposit,1,2,1\ndeposit,1,3,1\n');
    const seen: number[] = [];

    for await (const result of readTransactionRecords(csvPath)) {
      if (result.isOk()) seen.push(result.value.txId);
      break;
    }

    expect(seen).toEqual([1]);
  });
});
