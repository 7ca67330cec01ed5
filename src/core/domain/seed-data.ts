/**
 * HR Seed Data
 *
 * Fixed demonstration rows, in insertion order. Departments load before the
 * employees that reference them.
 */

import type { DepartmentProps } from "./entities/department.js";
import type { EmployeeProps } from "./entities/employee.js";

export interface SeedBatch {
  departments: readonly DepartmentProps[];
  employees: readonly EmployeeProps[];
}

export const SEED_DEPARTMENTS: readonly DepartmentProps[] = [
  { departmentId: 10, departmentName: "Administration", managerId: 200, locationId: 1700 },
  { departmentId: 20, departmentName: "Marketing", managerId: 201, locationId: 1800 },
  { departmentId: 50, departmentName: "Shipping", managerId: 124, locationId: 1500 },
  { departmentId: 60, departmentName: "IT", managerId: 103, locationId: 1400 },
  { departmentId: 80, departmentName: "Sales", managerId: 145, locationId: 2500 },
  { departmentId: 90, departmentName: "Executive", managerId: 100, locationId: 1700 },
  { departmentId: 110, departmentName: "Accounting", managerId: 205, locationId: 1700 },
];

export const SEED_EMPLOYEES: readonly EmployeeProps[] = [
  {
    employeeId: 100,
    firstName: "Steven",
    lastName: "King",
    email: "SKING",
    phoneNumber: "515.123.4567",
    hireDate: "2003-06-17",
    jobId: "AD_PRES",
    salary: 24000,
    commissionPct: null,
    managerId: null,
    departmentId: 90,
  },
  {
    employeeId: 101,
    firstName: "Neena",
    lastName: "Kochhar",
    email: "NKOCHHAR",
    phoneNumber: "515.123.4568",
    hireDate: "2005-09-21",
    jobId: "AD_VP",
    salary: 17000,
    commissionPct: null,
    managerId: 100,
    departmentId: 90,
  },
  {
    employeeId: 102,
    firstName: "Lex",
    lastName: "De Haan",
    email: "LDEHAAN",
    phoneNumber: "515.123.4569",
    hireDate: "2001-01-13",
    jobId: "AD_VP",
    salary: 17000,
    commissionPct: null,
    managerId: 100,
    departmentId: 90,
  },
  {
    employeeId: 103,
    firstName: "Alexander",
    lastName: "Hunold",
    email: "AHUNOLD",
    phoneNumber: "590.423.4567",
    hireDate: "2006-01-03",
    jobId: "IT_PROG",
    salary: 9000,
    commissionPct: null,
    managerId: 102,
    departmentId: 60,
  },
  {
    employeeId: 104,
    firstName: "Bruce",
    lastName: "Ernst",
    email: "BERNST",
    phoneNumber: "590.423.4568",
    hireDate: "2007-05-21",
    jobId: "IT_PROG",
    salary: 6000,
    commissionPct: null,
    managerId: 103,
    departmentId: 60,
  },
  {
    employeeId: 200,
    firstName: "Jennifer",
    lastName: "Whalen",
    email: "JWHALEN",
    phoneNumber: "515.123.4444",
    hireDate: "2003-09-17",
    jobId: "AD_ASST",
    salary: 4400,
    commissionPct: null,
    managerId: 101,
    departmentId: 10,
  },
  {
    employeeId: 201,
    firstName: "Michael",
    lastName: "Hartstein",
    email: "MHARTSTE",
    phoneNumber: "515.123.5555",
    hireDate: "2004-02-17",
    jobId: "MK_MAN",
    salary: 13000,
    commissionPct: null,
    managerId: 100,
    departmentId: 20,
  },
];

export const HR_SEED: SeedBatch = {
  departments: SEED_DEPARTMENTS,
  employees: SEED_EMPLOYEES,
};
