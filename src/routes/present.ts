import { DepositView, LedgerTotals, Machine, Material, PeriodTotals } from "../models/store";
import { DepositErrorKind } from "../services/errors";
import { centiToPoints, gramsToKg } from "../services/units";

// JSON shapes of the HTTP surface. Amounts leave as decimal numbers.

export const ERROR_STATUS: Record<DepositErrorKind, { status: number; code: string }> = {
  InvalidReference: { status: 400, code: "INVALID_REFERENCE" },
  InvalidWeight: { status: 400, code: "INVALID_WEIGHT" },
  DuplicateSubmission: { status: 409, code: "DUPLICATE_SUBMISSION" },
  DailyLimitExceeded: { status: 429, code: "DAILY_LIMIT_EXCEEDED" },
  VelocityLimitExceeded: { status: 429, code: "VELOCITY_LIMIT_EXCEEDED" },
  MachineCapacityExceeded: { status: 400, code: "MACHINE_CAPACITY_EXCEEDED" }
};

export function presentTotals(totals: LedgerTotals) {
  return {
    total_points: centiToPoints(totals.centiPoints),
    total_weight_recycled: gramsToKg(totals.grams)
  };
}

export function presentPeriod(totals: PeriodTotals) {
  return {
    points_earned: centiToPoints(totals.centiPoints),
    weight_recycled: gramsToKg(totals.grams),
    deposits_made: totals.count
  };
}

export function presentDeposit(deposit: DepositView) {
  return {
    id: deposit.id,
    transaction_id: deposit.transactionId,
    weight_kg: gramsToKg(deposit.grams),
    material: deposit.materialName,
    points_earned: centiToPoints(deposit.centiPoints),
    machine_id: deposit.machineId,
    machine_location: deposit.machineLocation,
    deposit_time: deposit.createdAt.toISOString(),
    notes: deposit.notes
  };
}

/** Estimates: 2.5 kg CO2 and 1.8 kWh saved per kg recycled. */
export function environmentalImpact(grams: number) {
  return {
    co2_saved_kg: Math.round(grams * 2.5) / 1000,
    energy_saved_kwh: Math.round(grams * 1.8) / 1000
  };
}

export function presentMaterial(material: Material) {
  return {
    name: material.name,
    points_per_kg: centiToPoints(material.centiPointsPerKg),
    description: material.description,
    is_active: material.active
  };
}

export function presentMachine(machine: Machine) {
  return {
    machine_id: machine.machineId,
    location: machine.location,
    latitude: machine.latitude,
    longitude: machine.longitude,
    is_active: machine.active
  };
}
