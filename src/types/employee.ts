/** Stored frozen; replace a record rather than editing it. */
export interface EmployeeRecord {
  readonly name: string;
  readonly department: string;
  readonly salary: number;
}

export type EmployeeId = number;
