import { describe, it, expect, vi } from 'vitest';
import { StoreError, type Transaction } from '@ledger/types';
import {
  GoogleSheetsTransactionStore,
  InMemorySpreadsheetApi,
  InMemoryTransactionStore,
  a1Range,
  parseRange,
  type CellValue,
} from '@ledger/sheets';

function tx(description: string, amount: number, category: string | null = null): Transaction {
  return { date: '2024-03-01', description, amount, account: 'card-csv', category };
}

class FailingApi extends InMemorySpreadsheetApi {
  override async getValues(_range: string): Promise<CellValue[][]> {
    throw new Error('quota exceeded');
  }
}

describe('a1Range / parseRange', () => {
  it('should quote worksheet titles', () => {
    expect(a1Range("It's", 'A1')).toBe("'It''s'!A1");
    expect(parseRange("'It''s'!A1")).toEqual({ title: "It's", startRow: 1 });
    expect(parseRange("'Transactions'!A:Z")).toEqual({ title: 'Transactions', startRow: 1 });
    expect(parseRange("'Transactions'!3:3")).toEqual({ title: 'Transactions', startRow: 3 });
  });

  it('should reject unquoted ranges', () => {
    expect(() => parseRange('Sheet1!A1')).toThrow('Unsupported range: Sheet1!A1');
  });
});

describe('GoogleSheetsTransactionStore', () => {
  it('should read no history when the worksheet does not exist', async () => {
    const api = new InMemorySpreadsheetApi();
    const store = new GoogleSheetsTransactionStore(api);

    await expect(store.readHistory()).resolves.toEqual([]);
    expect(api.calls).toEqual(['listWorksheets']);
  });

  it('should warn about rows it cannot read', async () => {
    const api = new InMemorySpreadsheetApi('Budget', {
      Transactions: [
        ['Date', 'Description', 'Amount', 'Category'],
        ['2024-01-05', 'AMZN MKTPLACE', -59.9, 'Shopping'],
        ['someday', 'Lunch', -20, 'Food'],
      ],
    });
    const onWarning = vi.fn();
    const store = new GoogleSheetsTransactionStore(api, { onWarning });

    const history = await store.readHistory();

    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ description: 'AMZN MKTPLACE', account: 'manual', category: 'Shopping' });
    expect(onWarning).toHaveBeenCalledWith('Transactions row 3 skipped: unreadable date');
  });

  it('should create the worksheet and write a header on first append', async () => {
    const api = new InMemorySpreadsheetApi();
    const store = new GoogleSheetsTransactionStore(api);

    const result = await store.appendTransactions([tx('Coffee', -4.5), tx('Salary', 3200, 'Income')]);

    expect(result).toEqual({ appended: 2, range: "'Transactions'!A1:F3" });
    expect(api.rows('Transactions')).toEqual([
      ['Date', 'Description', 'Amount', 'Account', 'Category', 'Owner'],
      ['2024-03-01', 'Coffee', -4.5, 'card-csv', '', ''],
      ['2024-03-01', 'Salary', 3200, 'card-csv', 'Income', ''],
    ]);
  });

  it('should append under an existing header in its own column order', async () => {
    const api = new InMemorySpreadsheetApi('Budget', {
      Transactions: [
        ['Data', 'Descricao', 'Valor', 'Categoria'],
        ['2024-01-01', 'Old', 1, 'Misc'],
      ],
    });
    const store = new GoogleSheetsTransactionStore(api);

    const result = await store.appendTransactions([tx('New', -5)]);

    expect(result).toEqual({ appended: 1, range: "'Transactions'!A3:D3" });
    expect(api.rows('Transactions')[2]).toEqual(['2024-03-01', 'New', -5, '']);
  });

  it('should refuse to append under a header missing required columns', async () => {
    const api = new InMemorySpreadsheetApi('Budget', { Transactions: [['Date', 'Description']] });
    const store = new GoogleSheetsTransactionStore(api);

    await expect(store.appendTransactions([tx('New', -5)])).rejects.toThrow(
      'appendTransactions failed: Worksheet is missing required columns: amount, category'
    );
    expect(api.rows('Transactions')).toHaveLength(1);
  });

  it('should not touch the sheet when there is nothing to append', async () => {
    const api = new InMemorySpreadsheetApi();
    const store = new GoogleSheetsTransactionStore(api);

    await expect(store.appendTransactions([])).resolves.toEqual({ appended: 0, range: null });
    expect(api.calls).toEqual([]);
  });

  it('should wrap API failures in StoreError', async () => {
    const store = new GoogleSheetsTransactionStore(new FailingApi('Budget', { Transactions: [] }));

    await expect(store.readHistory()).rejects.toBeInstanceOf(StoreError);
    await expect(store.readHistory()).rejects.toThrow('readHistory failed: quota exceeded');
  });

  it('should report whether ensureWorksheet created a worksheet', async () => {
    const store = new GoogleSheetsTransactionStore(new InMemorySpreadsheetApi());

    await expect(store.ensureWorksheet('Transactions')).resolves.toBe(true);
    await expect(store.ensureWorksheet('Transactions')).resolves.toBe(false);
  });

  it('should replace the reference table contents', async () => {
    const api = new InMemorySpreadsheetApi();
    const store = new GoogleSheetsTransactionStore(api, { referenceWorksheet: 'Keys' });

    await store.writeReferenceTable([
      ['Key', 'Category', 'Occurrences', 'Last Seen'],
      ['amzn mktplace', 'Shopping', 3, '2024-03-05'],
      ['netflix', 'Entertainment', 1, '2024-01-15'],
    ]);
    const written = await store.writeReferenceTable([
      ['Key', 'Category', 'Occurrences', 'Last Seen'],
      ['netflix', 'Entertainment', 2, '2024-02-15'],
    ]);

    expect(written).toBe(2);
    expect(api.rows('Keys')).toEqual([
      ['Key', 'Category', 'Occurrences', 'Last Seen'],
      ['netflix', 'Entertainment', 2, '2024-02-15'],
    ]);
  });
});

describe('InMemoryTransactionStore', () => {
  it('should append and report sheet-style ranges', async () => {
    const store = new InMemoryTransactionStore();

    await expect(store.appendTransactions([tx('A', 1), tx('B', 2)])).resolves.toEqual({ appended: 2, range: 'A2:F3' });
    await expect(store.appendTransactions([tx('C', 3)])).resolves.toEqual({ appended: 1, range: 'A4:F4' });
    expect((await store.readHistory()).map((t) => t.description)).toEqual(['A', 'B', 'C']);
  });
});
