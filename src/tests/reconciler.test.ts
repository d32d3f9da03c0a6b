import { AggregateInconsistencyError } from "../services/errors";
import { TestContext, createTestContext } from "./helpers";

describe("Aggregate Projection and Reconciliation", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
    const { ledger } = ctx.services;
    await ledger.createDeposit({ userId: "user-1", machineId: "RVM-001", materialName: "Plastic", weightKg: 2.5 });
    await ledger.createDeposit({ userId: "user-1", machineId: "RVM-001", materialName: "Metal", weightKg: 1.5 });
    await ledger.createDeposit({ userId: "user-2", machineId: "RVM-002", materialName: "Glass", weightKg: 2 });
  });

  function tamper(userId: string, centiPoints: number) {
    const aggregate = ctx.store.aggregates.get(userId);
    if (!aggregate) {
      throw new Error(`no aggregate for ${userId}`);
    }
    ctx.store.aggregates.set(userId, { ...aggregate, centiPoints });
  }

  test("incremental totals match a rebuild from the ledger", async () => {
    const { projector } = ctx.services;
    expect(await projector.getUserTotals("user-1")).toEqual({ centiPoints: 700, grams: 4000 });
    expect(await projector.rebuildUserAggregate("user-1")).toEqual({ centiPoints: 700, grams: 4000 });
    await expect(projector.assertConsistent("user-1")).resolves.toBeUndefined();
  });

  test("rebuilding twice gives the same totals", async () => {
    const { projector } = ctx.services;
    const first = await projector.rebuildUserAggregate("user-2");
    const second = await projector.rebuildUserAggregate("user-2");
    expect(second).toEqual(first);
    expect(second).toEqual({ centiPoints: 400, grams: 2000 });
  });

  test("a user without deposits has zero totals", async () => {
    const { projector } = ctx.services;
    expect(await projector.getUserTotals("nobody")).toEqual({ centiPoints: 0, grams: 0 });
    expect(await projector.rebuildUserAggregate("nobody")).toEqual({ centiPoints: 0, grams: 0 });
    expect(await projector.auditUser("nobody")).toEqual({
      userId: "nobody",
      stored: { centiPoints: 0, grams: 0 },
      ledger: { centiPoints: 0, grams: 0 },
      consistent: true
    });
    expect(ctx.store.aggregates.has("nobody")).toBe(false);
    expect((await ctx.store.catalogCounts()).users).toBe(2);
    expect((await ctx.services.reconciler.run()).checked).toBe(2);
  });

  test("a drifted aggregate fails the audit", async () => {
    tamper("user-1", 1);

    const audit = await ctx.services.projector.auditUser("user-1");
    expect(audit).toEqual({
      userId: "user-1",
      stored: { centiPoints: 1, grams: 4000 },
      ledger: { centiPoints: 700, grams: 4000 },
      consistent: false
    });
    await expect(ctx.services.projector.assertConsistent("user-1")).rejects.toBeInstanceOf(AggregateInconsistencyError);
  });

  test("reconciliation rebuilds only the drifted aggregates", async () => {
    tamper("user-2", 999);

    const report = await ctx.services.reconciler.run();
    expect(report).toEqual({
      checked: 2,
      failed: [],
      repaired: [
        {
          userId: "user-2",
          before: { centiPoints: 999, grams: 2000 },
          after: { centiPoints: 400, grams: 2000 }
        }
      ]
    });
    expect(ctx.store.aggregates.get("user-2")?.centiPoints).toBe(400);

    const again = await ctx.services.reconciler.run();
    expect(again.repaired).toEqual([]);
  });

  test("overlapping runs share one pass", async () => {
    const spy = jest.spyOn(ctx.store, "listAggregateUserIds");
    const [a, b] = await Promise.all([ctx.services.reconciler.run(), ctx.services.reconciler.run()]);
    expect(a).toBe(b);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  test("an audit that throws is reported as failed and the pass continues", async () => {
    tamper("user-2", 5);
    jest.spyOn(ctx.services.projector, "assertConsistent").mockImplementation(async userId => {
      if (userId === "user-1") {
        throw new Error("read timeout");
      }
      const audit = await ctx.services.projector.auditUser(userId);
      if (!audit.consistent) {
        throw new AggregateInconsistencyError(userId, audit.stored, audit.ledger);
      }
    });

    const report = await ctx.services.reconciler.run();
    expect(report.failed).toEqual(["user-1"]);
    expect(report.repaired.map(item => item.userId)).toEqual(["user-2"]);
  });

  test("the periodic pass can be started and stopped", () => {
    jest.useFakeTimers();
    try {
      const run = jest.spyOn(ctx.services.reconciler, "run");
      ctx.services.reconciler.start(60_000);
      jest.advanceTimersByTime(120_000);
      expect(run).toHaveBeenCalledTimes(2);
      ctx.services.reconciler.stop();
      jest.advanceTimersByTime(120_000);
      expect(run).toHaveBeenCalledTimes(2);
    } finally {
      jest.useRealTimers();
    }
  });
});
