import { describe, it, expect } from 'vitest';
import { toStatementOutput } from '@bankcsv/output';
import { PARSER_VERSION, StatementOutputSchema } from '@bankcsv/types';
import { createMockResult } from '../helpers/extraction-result.js';

describe('toStatementOutput', () => {
  const parsedAt = new Date('2023-02-01T08:30:00.000Z');

  it('should convert amounts to two-decimal strings', () => {
    const output = toStatementOutput(createMockResult(), {
      account: 'Assets:Bank:Current',
      sourceFile: 'statement.csv',
      parsedAt,
    });

    expect(output.openingBalance).toEqual({ amount: '1000.00', currency: 'EUR' });
    expect(output.closingBalance).toEqual({ amount: '3450.00', currency: 'EUR' });
    expect(output.transactions.map((txn) => txn.amount)).toEqual(['-50.00', '2500.00']);
  });

  it('should keep transaction fields and order', () => {
    const output = toStatementOutput(createMockResult(), {
      account: 'Assets:Bank:Current',
      sourceFile: 'statement.csv',
      parsedAt,
    });

    expect(output.transactions[0]).toEqual({
      date: '2023-01-05',
      amount: '-50.00',
      currency: 'EUR',
      payee: 'Acme "Shop"',
      narration: '',
      account: 'Assets:Bank:Current',
      source: { file: 'statement.csv', line: 6 },
    });
    expect(output.transactions[1]?.payee).toBe('Employer; Inc.');
  });

  it('should record metadata', () => {
    const output = toStatementOutput(createMockResult(), {
      account: 'Assets:Bank:Current',
      sourceFile: '/data/statement.csv',
      parsedAt,
    });

    expect(output.account).toBe('Assets:Bank:Current');
    expect(output.period).toEqual({ start: '2023-01-01', end: '2023-01-31' });
    expect(output.metadata).toEqual({
      parserVersion: PARSER_VERSION,
      parsedAt: '2023-02-01T08:30:00.000Z',
      sourceFile: '/data/statement.csv',
    });
  });

  it('should produce a document that survives JSON round-tripping', () => {
    const output = toStatementOutput(createMockResult(), {
      account: 'Assets:Bank:Current',
      sourceFile: 'statement.csv',
    });

    const reparsed = StatementOutputSchema.safeParse(JSON.parse(JSON.stringify(output)));
    expect(reparsed.success).toBe(true);
  });

  it('should reject an empty account', () => {
    expect(() =>
      toStatementOutput(createMockResult(), { account: '', sourceFile: 'statement.csv', parsedAt })
    ).toThrow();
  });
});
