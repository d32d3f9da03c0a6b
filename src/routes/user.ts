import { Router } from "express";
import { AppServices } from "../container";
import { asyncRoute, callerOf, requireUser } from "./middleware";
import { presentDeposit, presentPeriod, presentTotals } from "./present";
import { centiToPoints, gramsToKg } from "../services/units";

export default function userRouter(services: AppServices): Router {
  const router = Router();
  router.use("/user", requireUser);

  router.get("/user/totals", asyncRoute(async (req, res) => {
    const totals = await services.projector.getUserTotals(callerOf(req));
    res.status(200).json(presentTotals(totals));
  }));

  router.get("/user/summary", asyncRoute(async (req, res) => {
    const userId = callerOf(req);
    const summary = await services.reporting.userSummary(userId);
    res.status(200).json({
      user_id: userId,
      ...presentTotals(summary.totals),
      deposits_count: summary.depositsCount,
      favorite_material: summary.favoriteMaterial,
      rank: summary.rank,
      recent_deposits: summary.recentDeposits.map(presentDeposit),
      monthly_stats: presentPeriod(summary.last30Days),
      material_breakdown: summary.breakdown.map(item => ({
        material: item.materialName,
        total_weight_kg: gramsToKg(item.grams),
        total_points: centiToPoints(item.centiPoints),
        deposit_count: item.count
      }))
    });
  }));

  return router;
}
