import { OrderedIndex, type OrderedIndexOptions } from '../engine/ordered-index.js';
import { Logger } from '../logging/logger.js';
import type { IndexOperation, IndexOutcome, MetricsRegistry } from '../metrics/registry.js';
import type { EmployeeId, EmployeeRecord } from '../types/employee.js';

export interface EmployeeDirectoryDeps {
  logger?: Logger;
  metrics?: MetricsRegistry;
  /** Applied to both indexes; pass a seeded `random` for reproducible layouts. */
  indexOptions?: Omit<OrderedIndexOptions<number>, 'compare'>;
}

const EMPLOYEES_INDEX = 'employees';
const SALARY_INDEX = 'salary';

/**
 * Toy record store: a primary index by id and a secondary index by salary.
 * Salaries are unique keys; the most recent writer owns a salary slot.
 */
export class EmployeeDirectory {
  readonly employees: OrderedIndex<EmployeeId, EmployeeRecord>;
  readonly salaryIndex: OrderedIndex<number, EmployeeId>;

  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;

  constructor(deps: EmployeeDirectoryDeps = {}) {
    this.employees = new OrderedIndex<EmployeeId, EmployeeRecord>(deps.indexOptions);
    this.salaryIndex = new OrderedIndex<number, EmployeeId>(deps.indexOptions);
    this.logger = deps.logger ?? new Logger('employee-directory');
    this.metrics = deps.metrics;
  }

  addEmployee(id: EmployeeId, name: string, department: string, salary: number): void {
    const previous = this.employees.search(id);
    if (previous) {
      this.releaseSalary(previous.salary, id);
    }

    this.employees.insert(id, Object.freeze({ name, department, salary }));
    this.claimSalary(salary, id);

    this.record(EMPLOYEES_INDEX, 'insert', previous ? 'updated' : 'created');
    this.logger.info('employee added', { index: EMPLOYEES_INDEX, employeeId: id, name });
  }

  getEmployee(id: EmployeeId): EmployeeRecord | undefined {
    const employee = this.employees.search(id);
    this.record(EMPLOYEES_INDEX, 'search', employee ? 'hit' : 'miss');
    return employee;
  }

  updateSalary(id: EmployeeId, salary: number): boolean {
    const employee = this.employees.search(id);
    if (!employee) {
      return false;
    }

    this.releaseSalary(employee.salary, id);
    this.employees.insert(id, Object.freeze({ ...employee, salary }));
    this.claimSalary(salary, id);

    this.record(EMPLOYEES_INDEX, 'insert', 'updated');
    this.logger.info('employee salary updated', {
      index: EMPLOYEES_INDEX,
      employeeId: id,
      previousSalary: employee.salary,
      salary,
    });
    return true;
  }

  removeEmployee(id: EmployeeId): boolean {
    const employee = this.employees.search(id);
    if (!employee) {
      return false;
    }

    this.releaseSalary(employee.salary, id);
    const removed = this.employees.delete(id);
    this.record(EMPLOYEES_INDEX, 'delete', removed ? 'hit' : 'miss');
    this.logger.info('employee removed', { index: EMPLOYEES_INDEX, employeeId: id });
    return removed;
  }

  listEmployees(): Array<[EmployeeId, EmployeeRecord]> {
    return this.employees.toOrderedEntries();
  }

  listBySalary(): Array<[number, EmployeeId]> {
    return this.salaryIndex.toOrderedEntries();
  }

  size(): number {
    return this.employees.size();
  }

  displayStructure(): string {
    return this.employees.dumpStructure((id, employee) => `(${id}, ${employee.name})`);
  }

  private claimSalary(salary: number, id: EmployeeId): void {
    const outcome = this.salaryIndex.has(salary) ? 'updated' : 'created';
    this.salaryIndex.insert(salary, id);
    this.record(SALARY_INDEX, 'insert', outcome);
  }

  private releaseSalary(salary: number, id: EmployeeId): void {
    if (this.salaryIndex.search(salary) !== id) {
      return;
    }

    this.salaryIndex.delete(salary);
    this.record(SALARY_INDEX, 'delete', 'hit');
  }

  private record(index: string, operation: IndexOperation, outcome: IndexOutcome): void {
    if (!this.metrics) {
      return;
    }

    this.metrics.recordOperation(index, operation, outcome);
    this.metrics.trackShape(index, index === EMPLOYEES_INDEX ? this.employees : this.salaryIndex);
  }
}
