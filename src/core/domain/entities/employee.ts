/**
 * Employee Entity
 */

import { EMPLOYEES_TABLE } from "../schema/hr-schema.js";
import { validateColumns } from "../services/row-validator.js";
import type { ColumnValue } from "../value-objects/column-type.js";

export interface EmployeeProps {
  employeeId: number;
  firstName: string | null;
  lastName: string;
  email: string;
  phoneNumber: string | null;
  /** YYYY-MM-DD */
  hireDate: string;
  jobId: string;
  salary: number | null;
  commissionPct: number | null;
  /** Informal reference to another employee, may dangle */
  managerId: number | null;
  departmentId: number | null;
}

export class Employee {
  readonly employeeId: number;
  readonly firstName: string | null;
  readonly lastName: string;
  readonly email: string;
  readonly phoneNumber: string | null;
  readonly hireDate: string;
  readonly jobId: string;
  readonly salary: number | null;
  readonly commissionPct: number | null;
  readonly managerId: number | null;
  readonly departmentId: number | null;

  private constructor(props: EmployeeProps) {
    this.employeeId = props.employeeId;
    this.firstName = props.firstName;
    this.lastName = props.lastName;
    this.email = props.email;
    this.phoneNumber = props.phoneNumber;
    this.hireDate = props.hireDate;
    this.jobId = props.jobId;
    this.salary = props.salary;
    this.commissionPct = props.commissionPct;
    this.managerId = props.managerId;
    this.departmentId = props.departmentId;
  }

  /**
   * Validates against the employees table before building the entity.
   * salary and commission_pct keep their rounded values.
   */
  static create(props: EmployeeProps): Employee {
    const columns = validateColumns(EMPLOYEES_TABLE, toColumns(props));
    return new Employee({
      ...props,
      salary: numberOrNull(columns.salary),
      commissionPct: numberOrNull(columns.commission_pct),
    });
  }

  static reconstitute(props: EmployeeProps): Employee {
    return new Employee(props);
  }

  hasDepartment(): boolean {
    return this.departmentId !== null;
  }

  toRow(): ColumnValue[] {
    const columns = toColumns(this);
    return EMPLOYEES_TABLE.columns.map((c) => columns[c.name] ?? null);
  }

  toProps(): EmployeeProps {
    return {
      employeeId: this.employeeId,
      firstName: this.firstName,
      lastName: this.lastName,
      email: this.email,
      phoneNumber: this.phoneNumber,
      hireDate: this.hireDate,
      jobId: this.jobId,
      salary: this.salary,
      commissionPct: this.commissionPct,
      managerId: this.managerId,
      departmentId: this.departmentId,
    };
  }
}

function numberOrNull(value: ColumnValue | undefined): number | null {
  return typeof value === "number" ? value : null;
}

function toColumns(props: EmployeeProps): Record<string, ColumnValue> {
  return {
    employee_id: props.employeeId,
    first_name: props.firstName,
    last_name: props.lastName,
    email: props.email,
    phone_number: props.phoneNumber,
    hire_date: props.hireDate,
    job_id: props.jobId,
    salary: props.salary,
    commission_pct: props.commissionPct,
    manager_id: props.managerId,
    department_id: props.departmentId,
  };
}
