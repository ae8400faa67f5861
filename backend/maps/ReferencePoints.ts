import { readFileSync } from "fs";
import { z } from "zod";
import type { LatLng } from "../domain/Clinic";
import { ValidationError } from "../domain/WorkflowErrors";
import { isValidCoordinate } from "./Geo";

// Named search origins (stations) with fixed coordinates.
// Static dataset; the directory consumes coordinates, never addresses.

export type ReferencePoint = Readonly<{
  name: string;
  aliases: readonly string[];
  coordinate: LatLng;
}>;

const ReferencePointFileSchema = z.object({
  referencePoints: z
    .array(
      z.object({
        name: z.string().min(1),
        aliases: z.array(z.string().min(1)).default([]),
        lat: z.number(),
        lng: z.number(),
      }),
    )
    .min(1),
});

function normalizeName(s: string): string {
  return s.normalize("NFKC").trim().replace(/\s+/g, " ").toLowerCase();
}

export class ReferencePointTable {
  private readonly byName = new Map<string, ReferencePoint>();

  constructor(private readonly points: readonly ReferencePoint[]) {
    for (const p of points) {
      if (!isValidCoordinate(p.coordinate.lat, p.coordinate.lng)) {
        throw new Error(`Reference point "${p.name}" has an invalid coordinate.`);
      }
      for (const key of [p.name, ...p.aliases]) this.byName.set(normalizeName(key), p);
    }
  }

  static fromJson(raw: unknown): ReferencePointTable {
    const parsed = ReferencePointFileSchema.parse(raw);
    return new ReferencePointTable(
      parsed.referencePoints.map((p) => ({ name: p.name, aliases: p.aliases, coordinate: { lat: p.lat, lng: p.lng } })),
    );
  }

  static load(path: string): ReferencePointTable {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return ReferencePointTable.fromJson(raw);
  }

  list(): readonly ReferencePoint[] {
    return this.points;
  }

  find(name: string): ReferencePoint | undefined {
    return this.byName.get(normalizeName(name));
  }

  resolve(name: string): ReferencePoint {
    const point = this.find(name);
    if (!point) {
      throw new ValidationError(
        `Unknown starting point "${name}". Choose one of: ${this.points.map((p) => p.name).join(", ")}.`,
        "origin.name",
      );
    }
    return point;
  }
}
