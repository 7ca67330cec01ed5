/**
 * Seed Script Renderer Unit Tests
 */

import { describe, it, expect } from "vitest";
import {
  renderColumnType,
  renderCreateTable,
  renderInsert,
  renderLiteral,
  renderSeedScript,
  renderSeedStatements,
} from "../../src/adapters/sql/seed-script.js";
import { DEPARTMENTS_TABLE, EMPLOYEES_TABLE } from "../../src/core/domain/schema/hr-schema.js";
import { numberType, varcharType, dateType } from "../../src/core/domain/value-objects/column-type.js";

const ORACLE_INSERTS = [
  "INSERT INTO departments VALUES (10, 'Administration', 200, 1700)",
  "INSERT INTO departments VALUES (20, 'Marketing', 201, 1800)",
  "INSERT INTO departments VALUES (50, 'Shipping', 124, 1500)",
  "INSERT INTO departments VALUES (60, 'IT', 103, 1400)",
  "INSERT INTO departments VALUES (80, 'Sales', 145, 2500)",
  "INSERT INTO departments VALUES (90, 'Executive', 100, 1700)",
  "INSERT INTO departments VALUES (110, 'Accounting', 205, 1700)",
  "INSERT INTO employees VALUES (100, 'Steven', 'King', 'SKING', '515.123.4567', DATE '2003-06-17', 'AD_PRES', 24000, NULL, NULL, 90)",
  "INSERT INTO employees VALUES (101, 'Neena', 'Kochhar', 'NKOCHHAR', '515.123.4568', DATE '2005-09-21', 'AD_VP', 17000, NULL, 100, 90)",
  "INSERT INTO employees VALUES (102, 'Lex', 'De Haan', 'LDEHAAN', '515.123.4569', DATE '2001-01-13', 'AD_VP', 17000, NULL, 100, 90)",
  "INSERT INTO employees VALUES (103, 'Alexander', 'Hunold', 'AHUNOLD', '590.423.4567', DATE '2006-01-03', 'IT_PROG', 9000, NULL, 102, 60)",
  "INSERT INTO employees VALUES (104, 'Bruce', 'Ernst', 'BERNST', '590.423.4568', DATE '2007-05-21', 'IT_PROG', 6000, NULL, 103, 60)",
  "INSERT INTO employees VALUES (200, 'Jennifer', 'Whalen', 'JWHALEN', '515.123.4444', DATE '2003-09-17', 'AD_ASST', 4400, NULL, 101, 10)",
  "INSERT INTO employees VALUES (201, 'Michael', 'Hartstein', 'MHARTSTE', '515.123.5555', DATE '2004-02-17', 'MK_MAN', 13000, NULL, 100, 20)",
];

const ORACLE_DEPARTMENTS_DDL = [
  "CREATE TABLE departments (",
  "    department_id NUMBER(4) PRIMARY KEY,",
  "    department_name VARCHAR2(30) NOT NULL,",
  "    manager_id NUMBER(6),",
  "    location_id NUMBER(4)",
  ")",
].join("\n");

const ORACLE_EMPLOYEES_DDL = [
  "CREATE TABLE employees (",
  "    employee_id NUMBER(6) PRIMARY KEY,",
  "    first_name VARCHAR2(20),",
  "    last_name VARCHAR2(25) NOT NULL,",
  "    email VARCHAR2(25) NOT NULL UNIQUE,",
  "    phone_number VARCHAR2(20),",
  "    hire_date DATE NOT NULL,",
  "    job_id VARCHAR2(10) NOT NULL,",
  "    salary NUMBER(8,2),",
  "    commission_pct NUMBER(2,2),",
  "    manager_id NUMBER(6),",
  "    department_id NUMBER(4),",
  "    CONSTRAINT fk_emp_dept FOREIGN KEY (department_id) REFERENCES departments(department_id)",
  ")",
].join("\n");

describe("renderSeedStatements", () => {
  it("should emit creates, department inserts, employee inserts, then COMMIT", () => {
    const statements = renderSeedStatements("oracle");

    expect(statements).toHaveLength(17);
    expect(statements[0]).toBe(ORACLE_DEPARTMENTS_DDL);
    expect(statements[1]).toBe(ORACLE_EMPLOYEES_DDL);
    expect(statements.slice(2, 16)).toEqual(ORACLE_INSERTS);
    expect(statements[16]).toBe("COMMIT");
  });

  it("should use PostgreSQL types for the postgres dialect", () => {
    const [departments] = renderSeedStatements("postgres");

    expect(departments).toBe(
      [
        "CREATE TABLE departments (",
        "    department_id NUMERIC(4) PRIMARY KEY,",
        "    department_name VARCHAR(30) NOT NULL,",
        "    manager_id NUMERIC(6),",
        "    location_id NUMERIC(4)",
        ")",
      ].join("\n"),
    );
  });

  it("should render inserts identically in both dialects", () => {
    expect(renderSeedStatements("postgres").slice(2)).toEqual(
      renderSeedStatements("oracle").slice(2),
    );
  });
});

describe("renderSeedScript", () => {
  it("should terminate every statement", () => {
    const script = renderSeedScript("oracle");

    expect(script.startsWith("CREATE TABLE departments (\n")).toBe(true);
    expect(script.endsWith(`${ORACLE_INSERTS[13]};\nCOMMIT;\n`)).toBe(true);
  });
});

describe("literals", () => {
  it("should render column types", () => {
    expect(renderColumnType(numberType(8, 2), "oracle")).toBe("NUMBER(8,2)");
    expect(renderColumnType(numberType(8, 2), "postgres")).toBe("NUMERIC(8,2)");
    expect(renderColumnType(varcharType(25), "oracle")).toBe("VARCHAR2(25)");
    expect(renderColumnType(dateType, "postgres")).toBe("DATE");
  });

  it("should double embedded quotes", () => {
    expect(renderLiteral("O'Connell", varcharType(25))).toBe("'O''Connell'");
  });

  it("should render nulls and dates", () => {
    expect(renderLiteral(null, numberType(2, 2))).toBe("NULL");
    expect(renderLiteral("2003-06-17", dateType)).toBe("DATE '2003-06-17'");
    expect(renderLiteral(0.15, numberType(2, 2))).toBe("0.15");
  });

  it("should fill missing trailing values with NULL", () => {
    expect(renderInsert(DEPARTMENTS_TABLE, [30, "Purchasing"])).toBe(
      "INSERT INTO departments VALUES (30, 'Purchasing', NULL, NULL)",
    );
  });

  it("should render the employees table for postgres", () => {
    expect(renderCreateTable(EMPLOYEES_TABLE, "postgres")).toContain(
      "    email VARCHAR(25) NOT NULL UNIQUE,\n",
    );
  });
});
