/**
 * Seed Verifier
 *
 * Compares the stored HR tables against the expected seed batch.
 */

import type { HrRepositoryPort } from "../../ports/hr-repository.port.js";
import type { DepartmentProps } from "../entities/department.js";
import type { EmployeeProps } from "../entities/employee.js";
import { HR_SEED, type SeedBatch } from "../seed-data.js";

export type VerificationStatus = "passed" | "failed";

export interface VerificationCheck {
  name: string;
  passed: boolean;
  message: string;
}

export interface VerificationReport {
  status: VerificationStatus;
  checks: VerificationCheck[];
  checkedAt: Date;
}

export class SeedVerifier {
  constructor(
    private readonly repository: HrRepositoryPort,
    private readonly expected: SeedBatch = HR_SEED,
  ) {}

  async verify(): Promise<VerificationReport> {
    const departments = (await this.repository.listDepartments()).map((d) => d.toProps());
    const employees = (await this.repository.listEmployees()).map((e) => e.toProps());

    const checks = [
      this.checkCount("departments", departments.length, this.expected.departments.length),
      this.checkCount("employees", employees.length, this.expected.employees.length),
      this.checkDepartmentReferences(departments, employees),
      this.checkDistinct("employee_id", employees.map((e) => e.employeeId)),
      this.checkDistinct("email", employees.map((e) => e.email)),
      this.checkRows(
        "departments",
        departments,
        this.expected.departments,
        (d) => d.departmentId,
      ),
      this.checkRows(
        "employees",
        employees,
        this.expected.employees,
        (e) => e.employeeId,
      ),
    ];

    return {
      status: checks.every((c) => c.passed) ? "passed" : "failed",
      checks,
      checkedAt: new Date(),
    };
  }

  private checkCount(table: string, actual: number, expected: number): VerificationCheck {
    return {
      name: `${table}.count`,
      passed: actual === expected,
      message: `${table}: ${actual} row(s), expected ${expected}`,
    };
  }

  private checkDepartmentReferences(
    departments: DepartmentProps[],
    employees: EmployeeProps[],
  ): VerificationCheck {
    const known = new Set(departments.map((d) => d.departmentId));
    const dangling = employees.filter(
      (e) => e.departmentId !== null && !known.has(e.departmentId),
    );

    return {
      name: "employees.department_id",
      passed: dangling.length === 0,
      message:
        dangling.length === 0
          ? "Every employee department exists"
          : `Unknown department for employee(s) ${dangling.map((e) => e.employeeId).join(", ")}`,
    };
  }

  private checkDistinct(column: string, values: Array<number | string>): VerificationCheck {
    const seen = new Set<number | string>();
    const duplicates = new Set<number | string>();
    for (const value of values) {
      if (seen.has(value)) duplicates.add(value);
      seen.add(value);
    }

    return {
      name: `employees.${column}.distinct`,
      passed: duplicates.size === 0,
      message:
        duplicates.size === 0
          ? `All ${column} values are distinct`
          : `Duplicate ${column}: ${[...duplicates].join(", ")}`,
    };
  }

  private checkRows<T extends object>(
    table: string,
    actual: T[],
    expected: readonly T[],
    keyOf: (row: T) => number,
  ): VerificationCheck {
    const byKey = new Map(actual.map((row) => [keyOf(row), row]));
    const mismatched = expected.filter((row) => {
      const stored = byKey.get(keyOf(row));
      return stored === undefined || !sameFields(stored, row);
    });

    return {
      name: `${table}.content`,
      passed: mismatched.length === 0,
      message:
        mismatched.length === 0
          ? `All ${table} rows match the seed`
          : `Missing or changed ${table} row(s): ${mismatched.map(keyOf).join(", ")}`,
    };
  }
}

function sameFields<T extends object>(a: T, b: T): boolean {
  const keys = Object.keys(b);
  return (
    Object.keys(a).length === keys.length &&
    keys.every((k) => Object.is(Reflect.get(a, k), Reflect.get(b, k)))
  );
}
