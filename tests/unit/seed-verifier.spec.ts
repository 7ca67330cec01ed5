import { describe, it, expect, beforeEach } from "vitest";
import { SeedVerifier } from "../../src/core/domain/services/seed-verifier.js";
import { InMemoryUnitOfWork } from "../../src/adapters/persistence/in-memory-hr.repository.js";
import { SeedDatabaseUseCase } from "../../src/core/use-cases/seed-database.use-case.js";
import { silentLogger } from "../../src/core/ports/logger.port.js";
import { HR_SEED, SEED_DEPARTMENTS, SEED_EMPLOYEES, type SeedBatch } from "../../src/core/domain/seed-data.js";

describe("SeedVerifier", () => {
  let unitOfWork: InMemoryUnitOfWork;

  beforeEach(() => {
    unitOfWork = new InMemoryUnitOfWork();
  });

  const load = (batch: SeedBatch) =>
    new SeedDatabaseUseCase(unitOfWork, { onConflict: "abort", batch }, silentLogger).execute();

  it("should pass every check after a full seed", async () => {
    await load(HR_SEED);

    const report = await new SeedVerifier(unitOfWork.reader()).verify();

    expect(report.status).toBe("passed");
    expect(report.checks.map((c) => c.name)).toEqual([
      "departments.count",
      "employees.count",
      "employees.department_id",
      "employees.employee_id.distinct",
      "employees.email.distinct",
      "departments.content",
      "employees.content",
    ]);
    expect(report.checks.every((c) => c.passed)).toBe(true);
    expect(report.checks[0]?.message).toBe("departments: 7 row(s), expected 7");
  });

  it("should report a missing department", async () => {
    await load({
      departments: SEED_DEPARTMENTS.filter((d) => d.departmentId !== 110),
      employees: SEED_EMPLOYEES,
    });

    const report = await new SeedVerifier(unitOfWork.reader()).verify();
    const byName = new Map(report.checks.map((c) => [c.name, c]));

    expect(report.status).toBe("failed");
    expect(byName.get("departments.count")?.message).toBe("departments: 6 row(s), expected 7");
    expect(byName.get("departments.content")?.message).toBe(
      "Missing or changed departments row(s): 110",
    );
    expect(byName.get("employees.content")?.passed).toBe(true);
  });

  it("should report a changed employee field", async () => {
    await load({
      departments: SEED_DEPARTMENTS,
      employees: SEED_EMPLOYEES.map((e) => (e.employeeId === 104 ? { ...e, salary: 6500 } : e)),
    });

    const report = await new SeedVerifier(unitOfWork.reader()).verify();
    const content = report.checks.find((c) => c.name === "employees.content");

    expect(report.status).toBe("failed");
    expect(content?.message).toBe("Missing or changed employees row(s): 104");
  });
});
