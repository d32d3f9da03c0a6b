import { Router } from "express";
import { z } from "zod";
import { AppServices } from "../container";
import { MAX_POINTS_PER_KG, centiToPoints, gramsToKg } from "../services/units";
import { asyncRoute, requireAdmin } from "./middleware";
import { presentMachine, presentMaterial, presentTotals } from "./present";

const materialBody = z.object({
  points_per_kg: z.number().positive().max(MAX_POINTS_PER_KG),
  description: z.string().max(500).default(""),
  is_active: z.boolean().default(true)
});

const machineBody = z.object({
  location: z.string().trim().min(1).max(200),
  latitude: z.number().min(-90).max(90).nullable().default(null),
  longitude: z.number().min(-180).max(180).nullable().default(null),
  is_active: z.boolean().default(true)
});

const pathKey = z.string().trim().min(1).max(50);

export default function adminRouter(services: AppServices): Router {
  const router = Router();
  router.use("/admin", requireAdmin);

  router.post("/admin/users/:userId/rebuild", asyncRoute(async (req, res) => {
    const userId = pathKey.parse(req.params.userId);
    const totals = await services.projector.rebuildUserAggregate(userId);
    res.status(200).json({ user_id: userId, ...presentTotals(totals) });
  }));

  router.post("/admin/reconcile", asyncRoute(async (req, res) => {
    const report = await services.reconciler.run();
    res.status(200).json({
      checked: report.checked,
      failed: report.failed,
      repaired: report.repaired.map(item => ({
        user_id: item.userId,
        before: presentTotals(item.before),
        after: presentTotals(item.after)
      }))
    });
  }));

  router.get("/admin/stats", asyncRoute(async (req, res) => {
    const stats = await services.reporting.systemStats();
    const { totals } = stats;
    res.status(200).json({
      system_totals: {
        total_weight_recycled: gramsToKg(totals.grams),
        total_points_awarded: centiToPoints(totals.centiPoints),
        total_deposits: totals.count,
        average_deposit_weight: totals.count === 0 ? 0 : gramsToKg(Math.round(totals.grams / totals.count))
      },
      top_materials: stats.topMaterials.map(material => ({
        name: material.name,
        total_deposits: material.count,
        total_weight_kg: gramsToKg(material.grams),
        points_per_kg: centiToPoints(material.centiPointsPerKg)
      })),
      top_machines: stats.topMachines.map(machine => ({
        machine_id: machine.machineId,
        location: machine.location,
        deposit_count: machine.count,
        total_weight_kg: gramsToKg(machine.grams)
      }))
    });
  }));

  router.put("/admin/materials/:name", asyncRoute(async (req, res) => {
    const name = pathKey.parse(req.params.name);
    const body = materialBody.parse(req.body);
    const material = await services.catalog.upsertMaterial({
      name,
      pointsPerKg: body.points_per_kg,
      description: body.description,
      active: body.is_active
    });
    res.status(200).json(presentMaterial(material));
  }));

  router.put("/admin/machines/:machineId", asyncRoute(async (req, res) => {
    const machineId = pathKey.parse(req.params.machineId);
    const body = machineBody.parse(req.body);
    const machine = await services.catalog.upsertMachine({
      machineId,
      location: body.location,
      latitude: body.latitude,
      longitude: body.longitude,
      active: body.is_active
    });
    res.status(200).json(presentMachine(machine));
  }));

  return router;
}
