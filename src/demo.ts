import { loadAppConfig } from './config/app-config.js';
import { OrderedIndex } from './engine/ordered-index.js';
import { Logger } from './logging/logger.js';
import { MetricsRegistry } from './metrics/registry.js';
import { EmployeeDirectory } from './records/employee-directory.js';
import { createRandomSource } from './utils/prng.js';

const FRUITS: Array<[number, string]> = [
  [10, 'Apple'],
  [20, 'Banana'],
  [5, 'Cherry'],
  [30, 'Date'],
  [15, 'Elderberry'],
  [25, 'Fig'],
];

const STAFF: Array<[number, string, string, number]> = [
  [1001, 'Alice Johnson', 'Engineering', 95_000],
  [1005, 'Bob Smith', 'Marketing', 65_000],
  [1002, 'Carol Williams', 'Engineering', 105_000],
  [1008, 'David Brown', 'Sales', 55_000],
  [1003, 'Eve Davis', 'HR', 70_000],
  [1010, 'Frank Miller', 'Engineering', 120_000],
];

async function main(): Promise<void> {
  const config = loadAppConfig();
  const logger = new Logger('demo', { minLevel: config.logLevel });
  const indexOptions = {
    maxLevel: config.index.maxLevel,
    promotionProbability: config.index.promotionProbability,
    random: createRandomSource(config.index.randomSeed),
  };

  const fruits = new OrderedIndex<number, string>(indexOptions);
  for (const [key, value] of FRUITS) {
    fruits.insert(key, value);
  }
  logger.info('fruit index loaded', { size: fruits.size(), entries: fruits.toOrderedEntries() });

  for (const key of [15, 25, 35]) {
    logger.info('search', { key, value: fruits.search(key) ?? null });
  }

  logger.info('structure', { levels: fruits.dumpStructure().split('\n') });

  for (const key of [20, 35, 5]) {
    logger.info('delete', { key, deleted: fruits.delete(key) });
  }
  logger.info('after deletions', { entries: fruits.toOrderedEntries() });

  const metrics = new MetricsRegistry({ collectDefaults: false });
  const directory = new EmployeeDirectory({
    logger: logger.child('employees'),
    metrics,
    indexOptions,
  });

  for (const [id, name, department, salary] of STAFF) {
    directory.addEmployee(id, name, department, salary);
  }
  logger.info('employee 1002', { employee: directory.getEmployee(1002) ?? null });

  directory.updateSalary(1001, 98_000);
  directory.removeEmployee(1008);

  logger.info('employees by id', { employees: directory.listEmployees(), total: directory.size() });
  logger.info('employees by salary', { salaries: directory.listBySalary() });
  logger.info('employee index structure', { levels: directory.displayStructure().split('\n') });

  process.stdout.write(await metrics.registry.metrics());
}

main().catch((error) => {
  new Logger('demo').error('fatal demo error', {
    error: String(error),
  });
  process.exit(1);
});
