import { Router } from "express";
import { AppServices } from "../container";
import { asyncRoute, requireUser } from "./middleware";
import { presentMachine, presentMaterial } from "./present";

export default function catalogRouter(services: AppServices): Router {
  const router = Router();

  router.get("/materials", requireUser, asyncRoute(async (req, res) => {
    const materials = await services.catalog.listMaterials();
    res.status(200).json(materials.map(presentMaterial));
  }));

  router.get("/machines", requireUser, asyncRoute(async (req, res) => {
    const machines = await services.catalog.listMachines();
    res.status(200).json(machines.map(presentMachine));
  }));

  return router;
}
