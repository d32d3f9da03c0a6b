import { Router } from "express";
import { z } from "zod";
import { AppServices } from "../container";
import { asyncRoute, callerOf, requireUser } from "./middleware";
import { ERROR_STATUS, environmentalImpact, presentDeposit, presentTotals } from "./present";

const decimalString = z.string().trim().regex(/^-?\d+(\.\d+)?$/, "Expected a decimal number").transform(Number);

const depositBody = z.object({
  machine_id: z.string().trim().min(1).max(20),
  material_name: z.string().trim().min(1).max(50),
  // range and precision are the guard's call, so only the type is checked here
  weight_kg: z.union([z.number(), decimalString]),
  notes: z.string().max(500).optional()
});

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine(value => {
    const date = new Date(`${value}T00:00:00.000Z`);
    // 2026-02-30 parses as March 2
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
  }, "Invalid date")
  .transform(value => new Date(`${value}T00:00:00.000Z`));

const historyQuery = z.object({
  material: z.string().trim().min(1).optional(),
  date_from: isoDate.optional(),
  date_to: isoDate.optional(),
  // unreadable page numbers fall back to the first page
  page: z.coerce.number().int().positive().catch(1)
});

export default function depositsRouter(services: AppServices): Router {
  const router = Router();
  router.use("/deposits", requireUser);

  router.post("/deposits", asyncRoute(async (req, res) => {
    const body = depositBody.parse(req.body);
    const result = await services.ledger.createDeposit({
      userId: callerOf(req),
      machineId: body.machine_id,
      materialName: body.material_name,
      weightKg: body.weight_kg,
      notes: body.notes
    });
    if (!result.ok) {
      const { status, code } = ERROR_STATUS[result.error.kind];
      const { kind, message, ...details } = result.error;
      return res.status(status).json({ success: false, error: { code, kind, message, details } });
    }

    const { deposit, machine, totals } = result.value;
    res.status(201).json({
      success: true,
      message: "Deposit recorded successfully",
      deposit: {
        ...presentDeposit({ ...deposit, machineLocation: machine.location }),
        environmental_impact: environmentalImpact(deposit.grams)
      },
      user_totals: {
        ...presentTotals(totals),
        rank: await services.reporting.rankOf(totals)
      }
    });
  }));

  router.get("/deposits/history", asyncRoute(async (req, res) => {
    const query = historyQuery.parse(req.query);
    const history = await services.reporting.depositHistory(callerOf(req), {
      material: query.material,
      dateFrom: query.date_from,
      dateTo: query.date_to,
      page: query.page
    });
    res.status(200).json({
      deposits: history.deposits.map(presentDeposit),
      pagination: {
        current_page: history.currentPage,
        total_pages: history.totalPages,
        total_deposits: history.totalDeposits,
        has_next: history.hasNext,
        has_previous: history.hasPrevious
      }
    });
  }));

  return router;
}
