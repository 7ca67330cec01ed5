/**
 * Department Entity
 */

import { DEPARTMENTS_TABLE } from "../schema/hr-schema.js";
import { validateRow } from "../services/row-validator.js";
import type { ColumnValue } from "../value-objects/column-type.js";

export interface DepartmentProps {
  departmentId: number;
  departmentName: string;
  /** Informal reference to an employee, may dangle */
  managerId: number | null;
  locationId: number | null;
}

export class Department {
  readonly departmentId: number;
  readonly departmentName: string;
  readonly managerId: number | null;
  readonly locationId: number | null;

  private constructor(props: DepartmentProps) {
    this.departmentId = props.departmentId;
    this.departmentName = props.departmentName;
    this.managerId = props.managerId;
    this.locationId = props.locationId;
  }

  /**
   * Validates against the departments table before building the entity
   */
  static create(props: DepartmentProps): Department {
    validateRow(DEPARTMENTS_TABLE, toColumns(props));
    return new Department(props);
  }

  static reconstitute(props: DepartmentProps): Department {
    return new Department(props);
  }

  toRow(): ColumnValue[] {
    const columns = toColumns(this);
    return DEPARTMENTS_TABLE.columns.map((c) => columns[c.name] ?? null);
  }

  toProps(): DepartmentProps {
    return {
      departmentId: this.departmentId,
      departmentName: this.departmentName,
      managerId: this.managerId,
      locationId: this.locationId,
    };
  }
}

function toColumns(props: DepartmentProps): Record<string, ColumnValue> {
  return {
    department_id: props.departmentId,
    department_name: props.departmentName,
    manager_id: props.managerId,
    location_id: props.locationId,
  };
}
