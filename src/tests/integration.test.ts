import request from "supertest";
import { Express } from "express";
import { createApp } from "../app";
import { DAY, TestContext, createTestContext } from "./helpers";

describe("RVM Deposit Ledger Endpoints", () => {
  let ctx: TestContext;
  let app: Express;

  beforeEach(async () => {
    ctx = await createTestContext({ historyPageSize: 2 });
    app = createApp(ctx.services);
  });

  function deposit(userId: string, body: Record<string, unknown>) {
    return request(app).post("/deposits").set("X-User-Id", userId).send(body);
  }

  describe("Reference Data", () => {
    test("lists active materials and machines", async () => {
      const materials = await request(app).get("/materials").set("X-User-Id", "user-1").expect(200);
      expect(materials.body.map((m: { name: string }) => m.name)).toEqual(["Glass", "Metal", "Plastic"]);
      expect(materials.body[1]).toEqual({
        name: "Metal",
        points_per_kg: 3,
        description: "Aluminum cans, metal containers",
        is_active: true
      });

      const machines = await request(app).get("/machines").set("X-User-Id", "user-1").expect(200);
      expect(machines.body).toHaveLength(3);
      expect(machines.body[0].machine_id).toBe("RVM-001");
    });

    test("requests without a caller id are refused", async () => {
      const res = await request(app).get("/materials").expect(401);
      expect(res.body.error.code).toBe("UNAUTHENTICATED");
      await request(app).post("/deposits").send({ machine_id: "RVM-001" }).expect(401);
    });
  });

  describe("Deposits", () => {
    test("records a deposit and returns the receipt", async () => {
      const res = await deposit("user-1", { machine_id: "RVM-001", material_name: "plastic", weight_kg: 2.5 }).expect(201);

      expect(res.body.success).toBe(true);
      expect(res.body.message).toBe("Deposit recorded successfully");
      expect(res.body.deposit).toMatchObject({
        id: 1,
        weight_kg: 2.5,
        material: "Plastic",
        points_earned: 2.5,
        machine_id: "RVM-001",
        machine_location: "City Mall - North Entrance",
        deposit_time: "2026-03-02T10:00:00.000Z",
        notes: "",
        environmental_impact: { co2_saved_kg: 6.25, energy_saved_kwh: 4.5 }
      });
      expect(res.body.deposit.transaction_id).toMatch(/^TXN-[0-9A-F]{24}$/);
      expect(res.body.user_totals).toEqual({ total_points: 2.5, total_weight_recycled: 2.5, rank: 1 });
    });

    test("accepts the weight as a decimal string", async () => {
      const res = await deposit("user-1", { machine_id: "RVM-002", material_name: "Metal", weight_kg: "1.5" }).expect(201);
      expect(res.body.deposit.points_earned).toBe(4.5);
    });

    test("malformed bodies are validation errors", async () => {
      const res = await deposit("user-1", { material_name: "Plastic", weight_kg: "heavy" }).expect(400);
      expect(res.body.error.code).toBe("VALIDATION_ERROR");
      expect(res.body.error.details.map((d: { path: string }) => d.path).sort()).toEqual(["machine_id", "weight_kg"]);

      const broken = await request(app)
        .post("/deposits")
        .set("X-User-Id", "user-1")
        .set("Content-Type", "application/json")
        .send("{\"machine_id\":")
        .expect(400);
      expect(broken.body.error.code).toBe("MALFORMED_JSON");
    });

    test("policy rejections carry their kind and details", async () => {
      const weight = await deposit("user-1", { machine_id: "RVM-001", material_name: "Plastic", weight_kg: 0 }).expect(400);
      expect(weight.body).toEqual({
        success: false,
        error: {
          code: "INVALID_WEIGHT",
          kind: "InvalidWeight",
          message: "Weight must be greater than 0",
          details: { weightKg: 0 }
        }
      });

      const machine = await deposit("user-1", { machine_id: "RVM-999", material_name: "Plastic", weight_kg: 1 }).expect(400);
      expect(machine.body.error).toEqual({
        code: "INVALID_REFERENCE",
        kind: "InvalidReference",
        message: "Invalid or inactive machine ID",
        details: { field: "machine_id", value: "RVM-999" }
      });
    });

    test("a repeated submission is a conflict", async () => {
      const body = { machine_id: "RVM-001", material_name: "Glass", weight_kg: 3 };
      await deposit("user-1", body).expect(201);
      const res = await deposit("user-1", body).expect(409);
      expect(res.body.error.code).toBe("DUPLICATE_SUBMISSION");
      expect(res.body.error.details).toEqual({ retryAfterSeconds: 60 });

      const totals = await request(app).get("/user/totals").set("X-User-Id", "user-1").expect(200);
      expect(totals.body).toEqual({ total_points: 6, total_weight_recycled: 3 });
    });

    test("too many deposits in a short time is rate limited", async () => {
      for (let i = 1; i <= 11; i++) {
        await deposit("user-1", { machine_id: "RVM-001", material_name: "Plastic", weight_kg: i }).expect(201);
      }
      const res = await deposit("user-1", { machine_id: "RVM-001", material_name: "Plastic", weight_kg: 12 }).expect(429);
      expect(res.body.error.code).toBe("VELOCITY_LIMIT_EXCEEDED");
    });
  });

  describe("History and Summary", () => {
    beforeEach(async () => {
      await deposit("user-1", { machine_id: "RVM-001", material_name: "Plastic", weight_kg: 1 }).expect(201);
      ctx.clock.advance(DAY);
      await deposit("user-1", { machine_id: "RVM-002", material_name: "Metal", weight_kg: 1 }).expect(201);
      ctx.clock.advance(DAY);
      await deposit("user-1", { machine_id: "RVM-001", material_name: "Plastic", weight_kg: 2 }).expect(201);
    });

    test("history is newest first and paginated", async () => {
      const first = await request(app).get("/deposits/history").set("X-User-Id", "user-1").expect(200);
      expect(first.body.deposits.map((d: { deposit_time: string }) => d.deposit_time)).toEqual([
        "2026-03-04T10:00:00.000Z",
        "2026-03-03T10:00:00.000Z"
      ]);
      expect(first.body.pagination).toEqual({
        current_page: 1,
        total_pages: 2,
        total_deposits: 3,
        has_next: true,
        has_previous: false
      });

      const past = await request(app).get("/deposits/history?page=9").set("X-User-Id", "user-1").expect(200);
      expect(past.body.pagination.current_page).toBe(2);
      expect(past.body.deposits).toHaveLength(1);
      expect(past.body.deposits[0].deposit_time).toBe("2026-03-02T10:00:00.000Z");
    });

    test("history filters by material and by inclusive date range", async () => {
      const byMaterial = await request(app).get("/deposits/history?material=plast").set("X-User-Id", "user-1").expect(200);
      expect(byMaterial.body.pagination.total_deposits).toBe(2);

      const byDate = await request(app)
        .get("/deposits/history?date_from=2026-03-03&date_to=2026-03-03")
        .set("X-User-Id", "user-1")
        .expect(200);
      expect(byDate.body.deposits).toHaveLength(1);
      expect(byDate.body.deposits[0].material).toBe("Metal");

      await request(app).get("/deposits/history?date_to=2026-13-45").set("X-User-Id", "user-1").expect(400);
      await request(app).get("/deposits/history?date_from=2026-02-30").set("X-User-Id", "user-1").expect(400);
    });

    test("another user's history is empty", async () => {
      const res = await request(app).get("/deposits/history").set("X-User-Id", "user-2").expect(200);
      expect(res.body.deposits).toEqual([]);
      expect(res.body.pagination).toEqual({
        current_page: 1,
        total_pages: 1,
        total_deposits: 0,
        has_next: false,
        has_previous: false
      });
    });

    test("the summary combines totals, rank and breakdown", async () => {
      await deposit("user-2", { machine_id: "RVM-003", material_name: "Metal", weight_kg: 10 }).expect(201);

      const res = await request(app).get("/user/summary").set("X-User-Id", "user-1").expect(200);
      expect(res.body).toMatchObject({
        user_id: "user-1",
        total_points: 6,
        total_weight_recycled: 4,
        deposits_count: 3,
        favorite_material: "Plastic",
        rank: 2,
        monthly_stats: { points_earned: 6, weight_recycled: 4, deposits_made: 3 },
        material_breakdown: [
          { material: "Plastic", total_weight_kg: 3, total_points: 3, deposit_count: 2 },
          { material: "Metal", total_weight_kg: 1, total_points: 3, deposit_count: 1 }
        ]
      });
      expect(res.body.recent_deposits).toHaveLength(3);
    });
  });

  describe("Administration", () => {
    const admin = { "X-User-Id": "ops-1", "X-User-Role": "admin" };

    test("admin routes need the admin role", async () => {
      const res = await request(app).get("/admin/stats").set("X-User-Id", "user-1").expect(403);
      expect(res.body.error.code).toBe("FORBIDDEN");
    });

    test("stats summarise the whole ledger", async () => {
      await deposit("user-1", { machine_id: "RVM-001", material_name: "Metal", weight_kg: 2 }).expect(201);
      await deposit("user-2", { machine_id: "RVM-002", material_name: "Plastic", weight_kg: 1 }).expect(201);

      const res = await request(app).get("/admin/stats").set(admin).expect(200);
      expect(res.body.system_totals).toEqual({
        total_weight_recycled: 3,
        total_points_awarded: 7,
        total_deposits: 2,
        average_deposit_weight: 1.5
      });
      expect(res.body.top_materials[0]).toEqual({ name: "Metal", total_deposits: 1, total_weight_kg: 2, points_per_kg: 3 });
      expect(res.body.top_machines.map((m: { machine_id: string }) => m.machine_id)).toEqual(["RVM-001", "RVM-002", "RVM-003"]);
    });

    test("rebuild and reconcile repair a drifted aggregate", async () => {
      await deposit("user-1", { machine_id: "RVM-001", material_name: "Glass", weight_kg: 1.25 }).expect(201);
      const aggregate = ctx.store.aggregates.get("user-1");
      expect(aggregate).toBeDefined();
      if (aggregate) {
        ctx.store.aggregates.set("user-1", { ...aggregate, centiPoints: 0 });
      }

      const reconcile = await request(app).post("/admin/reconcile").set(admin).expect(200);
      expect(reconcile.body).toEqual({
        checked: 1,
        failed: [],
        repaired: [
          {
            user_id: "user-1",
            before: { total_points: 0, total_weight_recycled: 1.25 },
            after: { total_points: 2.5, total_weight_recycled: 1.25 }
          }
        ]
      });

      const rebuild = await request(app).post("/admin/users/user-1/rebuild").set(admin).expect(200);
      expect(rebuild.body).toEqual({ user_id: "user-1", total_points: 2.5, total_weight_recycled: 1.25 });
    });

    test("material upserts validate the rate and deactivation blocks deposits", async () => {
      const bad = await request(app).put("/admin/materials/Glass").set(admin).send({ points_per_kg: 1.555 }).expect(400);
      expect(bad.body.error.code).toBe("INVALID_RATE");

      const huge = await request(app).put("/admin/materials/Glass").set(admin).send({ points_per_kg: 1000 }).expect(400);
      expect(huge.body.error.code).toBe("VALIDATION_ERROR");
      expect(huge.body.error.details[0].path).toBe("points_per_kg");

      const off = await request(app).put("/admin/materials/glass").set(admin).send({ points_per_kg: 2, is_active: false }).expect(200);
      expect(off.body).toEqual({ name: "Glass", points_per_kg: 2, description: "", is_active: false });

      const res = await deposit("user-1", { machine_id: "RVM-001", material_name: "Glass", weight_kg: 1 }).expect(400);
      expect(res.body.error.kind).toBe("InvalidReference");
    });

    test("machines can be registered", async () => {
      await request(app)
        .put("/admin/machines/RVM-004")
        .set(admin)
        .send({ location: "Harbour Ferry Terminal", latitude: 55.68, longitude: 12.59 })
        .expect(200);

      const machines = await request(app).get("/machines").set("X-User-Id", "user-1").expect(200);
      expect(machines.body.at(-1)).toEqual({
        machine_id: "RVM-004",
        location: "Harbour Ferry Terminal",
        latitude: 55.68,
        longitude: 12.59,
        is_active: true
      });
    });
  });

  describe("Health", () => {
    test("reports healthy with catalog counts", async () => {
      const res = await request(app).get("/health").expect(200);
      expect(res.body).toMatchObject({
        status: "healthy",
        database: "connected",
        cache: "connected",
        counts: { materials: 3, machines: 3, users: 0 }
      });
    });

    test("reports degraded when the cache is unreachable", async () => {
      jest.spyOn(ctx.cache, "ping").mockResolvedValueOnce(false);
      const res = await request(app).get("/health").expect(200);
      expect(res.body.status).toBe("degraded");
      expect(res.body.cache).toBe("unavailable");
    });

    test("reports unhealthy when the store fails", async () => {
      jest.spyOn(ctx.store, "catalogCounts").mockRejectedValueOnce(new Error("connection refused"));
      const res = await request(app).get("/health").expect(503);
      expect(res.body.status).toBe("unhealthy");
    });
  });
});
