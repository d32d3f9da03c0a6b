import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ReferenceCatalog } from "./catalog";
import { MAX_POINTS_PER_KG } from "./units";

export const DEFAULT_CATALOG_PATH = path.join(__dirname, "../../data/catalog.json");

const catalogFileSchema = z.object({
    materials: z.array(z.object({
        name: z.string().min(1),
        points_per_kg: z.number().positive().max(MAX_POINTS_PER_KG),
        description: z.string().default(""),
        active: z.boolean().default(true)
    })),
    machines: z.array(z.object({
        machine_id: z.string().min(1),
        location: z.string().min(1),
        latitude: z.number().nullable().default(null),
        longitude: z.number().nullable().default(null),
        active: z.boolean().default(true)
    }))
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;

export function readCatalogFile(file: string = DEFAULT_CATALOG_PATH): CatalogFile {
    return catalogFileSchema.parse(JSON.parse(fs.readFileSync(file, "utf8")));
}

/** Upserts every material and machine in the file. Re-running it is harmless. */
export async function seedCatalog(catalog: ReferenceCatalog, file?: string): Promise<{ materials: number; machines: number }> {
    const data = readCatalogFile(file);
    for (const material of data.materials) {
        await catalog.upsertMaterial({
            name: material.name,
            pointsPerKg: material.points_per_kg,
            description: material.description,
            active: material.active
        });
    }
    for (const machine of data.machines) {
        await catalog.upsertMachine({
            machineId: machine.machine_id,
            location: machine.location,
            latitude: machine.latitude,
            longitude: machine.longitude,
            active: machine.active
        });
    }
    return { materials: data.materials.length, machines: data.machines.length };
}
