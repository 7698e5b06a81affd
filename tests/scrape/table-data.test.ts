import { describe, it, expect, vi } from 'vitest';
import {
  LayoutAssertionError,
  TableTuningSchema,
  anno,
  page,
  shape,
  silentLogger,
  textBox,
  textLine,
} from '@glyphscrape/types';
import {
  TableRow,
  baseProcessors,
  regroupLines,
  regroupWrappedHeaders,
  saveTextLine,
  scrapeDocument,
  scrapePage,
  simpleProcessor,
  tableColumns,
  tableDataProcessor,
} from '@glyphscrape/scrape';
import type { CollectEndCallback, Processor, TableData } from '@glyphscrape/scrape';
import { PAGE_BOX, charAt } from '../layout/helpers.js';
import { tableLine } from './helpers.js';

const tuning = TableTuningSchema.parse({});

describe('saveTextLine', () => {
  it('should split a line into cells at wide spaces', () => {
    const tableData: TableData = new Map();
    saveTextLine(tableData, tableLine(100, [['Label', 10], ['12,50', 60]]), tuning);

    expect(tableData.get(100)?.cells()).toEqual([
      { x0: 10, x1: 30, text: 'label' },
      { x0: 60, x1: 80, text: '12,50' },
    ]);
  });

  it('should keep close words in one cell with rounded coordinates', () => {
    const tableData: TableData = new Map();
    const line = textLine(PAGE_BOX, [
      charAt('A', 10.4, 14.4, 100),
      anno(' '),
      charAt('b', 16.6, 22.6, 100),
      anno('\n'),
    ]);
    saveTextLine(tableData, line, tuning);

    expect(tableData.get(0)?.cells()).toEqual([{ x0: 10, x1: 23, text: 'a b' }]);
  });

  it('should leave out cells starting with a skipped prefix', () => {
    const tableData: TableData = new Map();
    saveTextLine(tableData, tableLine(100, [['Label', 10], ['12,50', 60]]), tuning, ['label']);
    saveTextLine(tableData, tableLine(90, [['Label', 10]]), tuning, ['label']);

    expect(tableData.get(100)?.texts()).toEqual(['12,50']);
    expect(tableData.has(90)).toBe(false);
  });

  it('should reject anything but characters and annotations', () => {
    const withRect = textLine(PAGE_BOX, [charAt('a', 10, 14, 100), shape('rect', PAGE_BOX)]);
    const withTab = textLine(PAGE_BOX, [charAt('a', 10, 14, 100), anno('\t')]);

    expect(() => saveTextLine(new Map(), withRect, tuning)).toThrow(LayoutAssertionError);
    expect(() => saveTextLine(new Map(), withTab, tuning)).toThrow(LayoutAssertionError);
  });
});

describe('regroupLines', () => {
  const tableData = (): TableData =>
    new Map([
      [80, TableRow.of([[10, 30, 'c']])],
      [100, TableRow.of([[10, 30, 'a']])],
      [97, TableRow.of([[60, 80, 'b']])],
    ]);

  it('should merge rows closer than the threshold, top to bottom', () => {
    const data = tableData();
    const lines = regroupLines(data);

    expect(lines.map((line) => line.y)).toEqual([100, 80]);
    expect(tableColumns(lines)).toEqual([['a', 'b'], ['c']]);
    expect(data.get(100)?.size).toBe(1);
  });

  it('should honour a custom threshold', () => {
    expect(tableColumns(regroupLines(tableData(), { rowThreshold: 2 }))).toEqual([['a'], ['b'], ['c']]);
  });
});

describe('regroupWrappedHeaders', () => {
  const row = (...cells: Array<[x0: number, x1: number, text: string]>) => TableRow.of(cells);

  it('should fold wrapped labels into the row above', () => {
    const lines = regroupWrappedHeaders([
      { y: 100, row: row([10, 50, 'consommation'], [100, 120, '12']) },
      { y: 90, row: row([10, 40, 'heures pleines']) },
      { y: 70, row: row([10, 40, 'abonnement'], [100, 120, '5']) },
    ]);

    expect(tableColumns(lines)).toEqual([
      ['consommation heures pleines', '12'],
      ['abonnement', '5'],
    ]);
  });

  it('should not fold rows too far below', () => {
    const close = regroupWrappedHeaders([
      { y: 100, row: row([10, 40, 'a']) },
      { y: 85, row: row([10, 40, 'b']) },
    ]);
    const far = regroupWrappedHeaders([
      { y: 100, row: row([10, 40, 'a']) },
      { y: 84, row: row([10, 40, 'b']) },
    ]);

    expect(tableColumns(close)).toEqual([['a b']]);
    expect(tableColumns(far)).toEqual([['a'], ['b']]);
  });

  it('should not fold misaligned rows nor skipped tokens', () => {
    const lines = regroupWrappedHeaders(
      [
        { y: 100, row: row([10, 40, 'a']) },
        { y: 95, row: row([12, 40, 'b']) },
        { y: 90, row: row([12, 40, 'total']) },
      ],
      { skipTokens: new Set(['total']) }
    );

    expect(tableColumns(lines)).toEqual([['a'], ['b'], ['total']]);
  });
});

interface Bill {
  rows: string[][];
}

const billPage = () =>
  page(PAGE_BOX, [
    textBox(PAGE_BOX, [tableLine(700, [['Détail de la facture', 50]])]),
    tableLine(650, [['Consommation', 50], ['12,50', 300]]),
    tableLine(640, [['heures pleines', 50]]),
    tableLine(600, [['Abonnement', 50], ['5,00', 300]]),
  ]);

const collectRows: CollectEndCallback<string, Bill> = (_state, data, tableData) => {
  data.rows.push(...tableColumns(regroupWrappedHeaders(regroupLines(tableData))));
  return 'collected';
};

describe('tableDataProcessor', () => {
  const chain = (
    onCollectEnd: CollectEndCallback<string, Bill>,
    ...after: Array<Processor<string, Bill>>
  ): Array<Processor<string, Bill>> => [
    ...baseProcessors<string, Bill>(),
    tableDataProcessor<string, Bill>({ triggerStates: ['start'], triggerText: 'détail', onCollectEnd }),
    ...after,
  ];

  it('should collect the lines following the trigger until the end of page', () => {
    const bill: Bill = { rows: [] };
    const onCollectEnd = vi.fn(collectRows);

    const state = scrapePage(billPage(), chain(onCollectEnd), bill, 'start', { logger: silentLogger });

    expect(state).toBe('collected');
    expect(onCollectEnd).toHaveBeenCalledTimes(1);
    expect(onCollectEnd.mock.calls[0]?.[0]).toBe('start');
    expect(bill.rows).toEqual([
      ['détail de la facture'],
      ['consommation heures pleines', '12,50'],
      ['abonnement', '5,00'],
    ]);
  });

  it('should not collect outside of its trigger states', () => {
    const bill: Bill = { rows: [] };
    const onCollectEnd = vi.fn(collectRows);

    const state = scrapePage(billPage(), chain(onCollectEnd), bill, 'elsewhere', { logger: silentLogger });

    expect(state).toBe('elsewhere');
    expect(onCollectEnd).not.toHaveBeenCalled();
    expect(bill.rows).toEqual([]);
  });

  it('should leave out lines consumed further down the chain', () => {
    const bill: Bill = { rows: [] };
    const skipSubscription = simpleProcessor<string, Bill>((step) => ({
      handled: step.node !== null && step.node.lowerText.startsWith('abonnement'),
    }));

    scrapePage(billPage(), chain(collectRows, skipSubscription), bill, 'start', { logger: silentLogger });

    expect(bill.rows).toEqual([['détail de la facture'], ['consommation heures pleines', '12,50']]);
  });

  it('should start collecting again on every page', () => {
    const bill: Bill = { rows: [] };
    const onCollectEnd = vi.fn((_state: string, data: Bill, tableData: TableData) => {
      data.rows.push(...tableColumns(regroupLines(tableData)));
      return undefined;
    });

    const state = scrapeDocument([billPage(), billPage()], chain(onCollectEnd), bill, 'start', {
      logger: silentLogger,
    });

    expect(state).toBe('start');
    expect(onCollectEnd).toHaveBeenCalledTimes(2);
    expect(bill.rows).toHaveLength(8);
  });
});
