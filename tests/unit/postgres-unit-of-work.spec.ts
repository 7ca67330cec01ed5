import { describe, it, expect, vi, beforeEach } from "vitest";
import pg from "pg";
import type { Pool } from "pg";
import { PostgresUnitOfWork } from "../../src/adapters/persistence/postgres-unit-of-work.js";
import { PostgresHrRepository } from "../../src/adapters/persistence/postgres-hr.repository.js";
import { SeedDatabaseUseCase } from "../../src/core/use-cases/seed-database.use-case.js";
import { silentLogger } from "../../src/core/ports/logger.port.js";
import { ForeignKeyViolationError } from "../../src/core/domain/errors/index.js";

describe("PostgresUnitOfWork", () => {
  let client: { query: ReturnType<typeof vi.fn>; release: ReturnType<typeof vi.fn> };
  let pool: Pool;

  beforeEach(() => {
    client = {
      query: vi.fn().mockResolvedValue({ rows: [], rowCount: null }),
      release: vi.fn(),
    };
    pool = { connect: vi.fn().mockResolvedValue(client) } as unknown as Pool;
  });

  const statements = () => client.query.mock.calls.map((call) => call[0]);

  it("should open a transaction on a dedicated client", async () => {
    const transaction = await new PostgresUnitOfWork(pool).begin();

    expect(statements()).toEqual(["BEGIN"]);
    expect(transaction.repository).toBeInstanceOf(PostgresHrRepository);
  });

  it("should commit and release the client", async () => {
    const transaction = await new PostgresUnitOfWork(pool).begin();

    await transaction.commit();

    expect(statements()).toEqual(["BEGIN", "COMMIT"]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("should roll back and release the client", async () => {
    const transaction = await new PostgresUnitOfWork(pool).begin();

    await transaction.rollback();
    await transaction.rollback();

    expect(statements()).toEqual(["BEGIN", "ROLLBACK"]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("should keep the client for rollback after a failed commit", async () => {
    const transaction = await new PostgresUnitOfWork(pool).begin();
    client.query.mockRejectedValueOnce(new Error("could not serialize access"));

    await expect(transaction.commit()).rejects.toThrow("could not serialize access");
    expect(client.release).not.toHaveBeenCalled();

    await transaction.rollback();
    expect(statements()).toEqual(["BEGIN", "COMMIT", "ROLLBACK"]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("should refuse to commit twice", async () => {
    const transaction = await new PostgresUnitOfWork(pool).begin();
    await transaction.commit();

    await expect(transaction.commit()).rejects.toThrow("Transaction already finished");
  });

  it("should release a client whose BEGIN failed", async () => {
    const failure = new Error("connection reset");
    client.query.mockRejectedValueOnce(failure);

    await expect(new PostgresUnitOfWork(pool).begin()).rejects.toBe(failure);
    expect(client.release).toHaveBeenCalledWith(failure);
  });
});

describe("Seeding through PostgresUnitOfWork", () => {
  const foreignKeyError = Object.assign(
    new pg.DatabaseError(
      'insert or update on table "employees" violates foreign key constraint "fk_emp_dept"',
      0,
      "error",
    ),
    { code: "23503", constraint: "fk_emp_dept", table: "employees" },
  );

  const createPool = (failEmployees: boolean) => {
    const client = {
      query: vi.fn(async (sql: string) => {
        if (sql.startsWith("SELECT to_regclass")) {
          return { rows: [{ exists: false }], rowCount: 1 };
        }
        if (failEmployees && sql.startsWith("INSERT INTO employees")) {
          throw foreignKeyError;
        }
        return { rows: [], rowCount: 1 };
      }),
      release: vi.fn(),
    };
    const pool = { connect: vi.fn().mockResolvedValue(client) } as unknown as Pool;
    return { pool, client };
  };

  const statements = (client: { query: { mock: { calls: unknown[][] } } }) =>
    client.query.mock.calls.map((call) => String(call[0]).split(" (")[0]);

  it("should create, insert and commit on one client", async () => {
    const { pool, client } = createPool(false);

    const report = await new SeedDatabaseUseCase(new PostgresUnitOfWork(pool), { onConflict: "abort" }, silentLogger).execute();

    expect(report.rowsInserted).toEqual({ departments: 7, employees: 7 });
    const sent = statements(client);
    expect(sent[0]).toBe("BEGIN");
    expect(sent.filter((sql) => sql.startsWith("CREATE TABLE"))).toEqual([
      "CREATE TABLE departments",
      "CREATE TABLE employees",
    ]);
    expect(sent.filter((sql) => sql.startsWith("INSERT INTO"))).toHaveLength(14);
    expect(sent[sent.length - 1]).toBe("COMMIT");
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledWith();
  });

  it("should roll back everything when an employee insert breaks fk_emp_dept", async () => {
    const { pool, client } = createPool(true);

    const result = new SeedDatabaseUseCase(new PostgresUnitOfWork(pool), { onConflict: "abort" }, silentLogger).execute();

    await expect(result).rejects.toBeInstanceOf(ForeignKeyViolationError);
    await expect(result).rejects.toHaveProperty("constraint", "fk_emp_dept");
    await expect(result).rejects.toHaveProperty("key", 100);

    const sent = statements(client);
    expect(sent).not.toContain("COMMIT");
    expect(sent[sent.length - 1]).toBe("ROLLBACK");
    expect(sent.filter((sql) => sql.startsWith("INSERT INTO departments"))).toHaveLength(7);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
