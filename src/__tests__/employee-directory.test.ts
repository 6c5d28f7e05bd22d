import { describe, expect, it } from 'vitest';

import { Logger } from '../logging/logger.js';
import { MetricsRegistry } from '../metrics/registry.js';
import { EmployeeDirectory } from '../records/employee-directory.js';
import { SequenceRandom, XorShift32 } from '../utils/prng.js';

const STAFF: Array<[number, string, string, number]> = [
  [1001, 'Alice Johnson', 'Engineering', 95_000],
  [1005, 'Bob Smith', 'Marketing', 65_000],
  [1002, 'Carol Williams', 'Engineering', 105_000],
  [1008, 'David Brown', 'Sales', 55_000],
  [1003, 'Eve Davis', 'HR', 70_000],
  [1010, 'Frank Miller', 'Engineering', 120_000],
];

function createDirectory(lines: string[] = [], metrics?: MetricsRegistry): EmployeeDirectory {
  const directory = new EmployeeDirectory({
    logger: new Logger('employees', { sink: (line) => lines.push(line) }),
    metrics,
    indexOptions: { random: new XorShift32(31) },
  });

  for (const [id, name, department, salary] of STAFF) {
    directory.addEmployee(id, name, department, salary);
  }
  return directory;
}

describe('EmployeeDirectory', () => {
  it('indexes employees by id and by salary', () => {
    const directory = createDirectory();

    expect(directory.size()).toBe(6);
    expect(directory.getEmployee(1002)).toEqual({
      name: 'Carol Williams',
      department: 'Engineering',
      salary: 105_000,
    });
    expect(directory.getEmployee(9999)).toBeUndefined();
    expect(directory.listEmployees().map(([id]) => id)).toEqual([1001, 1002, 1003, 1005, 1008, 1010]);
    expect(directory.listBySalary()).toEqual([
      [55_000, 1008],
      [65_000, 1005],
      [70_000, 1003],
      [95_000, 1001],
      [105_000, 1002],
      [120_000, 1010],
    ]);
  });

  it('moves the salary index entry on salary updates', () => {
    const directory = createDirectory();

    expect(directory.updateSalary(1001, 98_000)).toBe(true);
    expect(directory.getEmployee(1001)?.salary).toBe(98_000);
    expect(directory.salaryIndex.search(95_000)).toBeUndefined();
    expect(directory.salaryIndex.search(98_000)).toBe(1001);
    expect(directory.size()).toBe(6);

    expect(directory.updateSalary(4242, 1)).toBe(false);
  });

  it('removes employees from both indexes', () => {
    const directory = createDirectory();

    expect(directory.removeEmployee(1008)).toBe(true);
    expect(directory.size()).toBe(5);
    expect(directory.getEmployee(1008)).toBeUndefined();
    expect(directory.salaryIndex.has(55_000)).toBe(false);
    expect(directory.salaryIndex.size()).toBe(5);

    expect(directory.removeEmployee(1008)).toBe(false);
  });

  it('leaves a shared salary slot with its latest owner', () => {
    const directory = createDirectory();
    directory.addEmployee(1020, 'Grace Lee', 'Sales', 55_000);

    expect(directory.salaryIndex.search(55_000)).toBe(1020);
    expect(directory.removeEmployee(1008)).toBe(true);
    expect(directory.salaryIndex.search(55_000)).toBe(1020);
  });

  it('re-adding an id replaces its record and salary entry', () => {
    const directory = createDirectory();
    directory.addEmployee(1005, 'Bob Smith', 'Sales', 66_000);

    expect(directory.size()).toBe(6);
    expect(directory.getEmployee(1005)?.department).toBe('Sales');
    expect(directory.salaryIndex.has(65_000)).toBe(false);
    expect(directory.salaryIndex.search(66_000)).toBe(1005);
  });

  it('logs each change as a structured entry', () => {
    const lines: string[] = [];
    const directory = createDirectory(lines);
    directory.updateSalary(1001, 98_000);
    directory.removeEmployee(1003);

    const messages = lines.map((line) => (JSON.parse(line) as { message: string }).message);
    expect(messages).toEqual([
      ...STAFF.map(() => 'employee added'),
      'employee salary updated',
      'employee removed',
    ]);
    expect(JSON.parse(lines[6])).toMatchObject({
      employeeId: 1001,
      previousSalary: 95_000,
      salary: 98_000,
    });
  });

  it('records operations and index shape in metrics', async () => {
    const metrics = new MetricsRegistry({ collectDefaults: false });
    const directory = createDirectory([], metrics);
    directory.getEmployee(4242);

    const operations = await metrics.indexOperationsTotal.get();
    const count = (index: string, operation: string, outcome: string): number | undefined =>
      operations.values.find(
        (entry) =>
          entry.labels.index === index && entry.labels.operation === operation && entry.labels.outcome === outcome
      )?.value;

    expect(count('employees', 'insert', 'created')).toBe(6);
    expect(count('salary', 'insert', 'created')).toBe(6);
    expect(count('employees', 'search', 'miss')).toBe(1);

    const entries = await metrics.indexEntries.get();
    expect(entries.values.find((entry) => entry.labels.index === 'employees')?.value).toBe(6);
  });

  it('dumps the id index with employee names', () => {
    const directory = new EmployeeDirectory({
      logger: new Logger('employees', { minLevel: 'error' }),
      indexOptions: { maxLevel: 2, random: new SequenceRandom([0.1, 0.9, 0.9, 0.9]) },
    });
    directory.addEmployee(2, 'Bea', 'HR', 10);
    directory.addEmployee(1, 'Al', 'HR', 20);

    expect(directory.displayStructure()).toBe(['Level 1: (2, Bea)', 'Level 0: (1, Al) (2, Bea)'].join('\n'));
  });

  it('hands out frozen records so removals still clear the salary index', () => {
    const directory = createDirectory();
    const record = directory.getEmployee(1001);

    expect(Object.isFrozen(record)).toBe(true);
    expect(() => Object.assign(record ?? {}, { salary: 200 })).toThrow(TypeError);
    expect(directory.getEmployee(1001)?.salary).toBe(95_000);

    expect(directory.removeEmployee(1001)).toBe(true);
    expect(directory.salaryIndex.has(95_000)).toBe(false);
    expect(directory.listBySalary().map(([, id]) => id)).not.toContain(1001);
  });

  it('keeps updated records frozen', () => {
    const directory = createDirectory();
    directory.updateSalary(1005, 70_500);

    expect(Object.isFrozen(directory.getEmployee(1005))).toBe(true);
  });

  it('does not count searches the caller never made', async () => {
    const metrics = new MetricsRegistry({ collectDefaults: false });
    const directory = createDirectory([], metrics);
    directory.updateSalary(1001, 98_000);
    directory.removeEmployee(1003);

    const operations = await metrics.indexOperationsTotal.get();
    const searches = operations.values.filter((entry) => entry.labels.operation === 'search');
    expect(searches).toEqual([]);
    expect(
      operations.values.find(
        (entry) => entry.labels.index === 'employees' && entry.labels.operation === 'delete'
      )?.value
    ).toBe(1);
  });
});
