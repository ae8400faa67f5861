/*
Clinic Directory
- The directory is NOT a medical authority and does NOT recommend providers.
- Ordering is by distance only (ties by id). No ranking, scoring or prioritization.
- Read-only: the dataset is loaded once at startup and never mutated.
*/

import type { Bounds, DirectoryConfig } from "../config/AppConfig";
import type { Clinic, ClinicResult, LatLng, SearchOrigin } from "../domain/Clinic";
import { EmptyResultError } from "../domain/WorkflowErrors";
import { loadClinicDataset } from "./ClinicDatasetLoader";
import { haversineMeters, toCoordinate } from "./Geo";
import { receptionStatusAt } from "./ReceptionHours";
import { ReferencePointTable } from "./ReferencePoints";

export type DirectorySettings = Pick<DirectoryConfig, "radiusMeters" | "maxResults" | "closingSoonThresholdMinutes">;

export type DirectoryFilters = Readonly<{
  // Any-match against the clinic's department list. Empty/omitted means no department filter.
  departmentKeywords?: readonly string[];
  excludeDepartmentKeywords?: readonly string[];
  excludeNameKeywords?: readonly string[];
  onlyAcceptingNow?: boolean;
}>;

export type ResolvedOrigin = Readonly<{ label: string; coordinate: LatLng }>;

export type DirectoryQuery = Readonly<{
  origin: SearchOrigin;
  radiusMeters?: number;
  maxResults?: number;
  closingSoonThresholdMinutes?: number;
  filters?: DirectoryFilters;
  now?: Date;
}>;

export type DirectoryQueryResult = Readonly<{
  origin: ResolvedOrigin;
  radiusMeters: number;
  maxResults: number;
  closingSoonThresholdMinutes: number;
  clinics: readonly ClinicResult[];
}>;

function clamp(value: number | undefined, b: Bounds): number {
  if (value === undefined || !Number.isFinite(value)) return b.default;
  return Math.min(b.max, Math.max(b.min, Math.round(value)));
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((n) => n.length > 0 && haystack.includes(n));
}

export class ClinicDirectory {
  private readonly clinics: readonly Clinic[];
  private readonly byId: ReadonlyMap<string, Clinic>;

  constructor(
    clinics: readonly Clinic[],
    readonly referencePoints: ReferencePointTable,
    private readonly settings: DirectorySettings,
  ) {
    this.clinics = Object.freeze([...clinics]);
    this.byId = new Map(clinics.map((c) => [c.id, c]));
  }

  static load(config: DirectoryConfig): ClinicDirectory {
    const { clinics } = loadClinicDataset(config.datasetPath);
    const referencePoints = ReferencePointTable.load(config.referencePointsPath);
    console.log(`[Directory] Loaded ${clinics.length} clinics and ${referencePoints.list().length} reference points`);
    return new ClinicDirectory(clinics, referencePoints, config);
  }

  get size(): number {
    return this.clinics.length;
  }

  get limits(): Readonly<{ radiusMeters: Bounds; maxResults: Bounds; closingSoonThresholdMinutes: Bounds }> {
    return {
      radiusMeters: this.settings.radiusMeters,
      maxResults: this.settings.maxResults,
      closingSoonThresholdMinutes: this.settings.closingSoonThresholdMinutes,
    };
  }

  findById(id: string): Clinic | undefined {
    return this.byId.get(id);
  }

  clampRadius(radiusMeters?: number): number {
    return clamp(radiusMeters, this.settings.radiusMeters);
  }

  clampMaxResults(maxResults?: number): number {
    return clamp(maxResults, this.settings.maxResults);
  }

  clampClosingSoonThreshold(minutes?: number): number {
    return clamp(minutes, this.settings.closingSoonThresholdMinutes);
  }

  resolveOrigin(origin: SearchOrigin): ResolvedOrigin {
    if (origin.kind === "reference") {
      const point = this.referencePoints.resolve(origin.name);
      return { label: point.name, coordinate: point.coordinate };
    }
    const coordinate = toCoordinate(origin.lat, origin.lng, "origin");
    return { label: `${coordinate.lat.toFixed(5)}, ${coordinate.lng.toFixed(5)}`, coordinate };
  }

  // Throws EmptyResultError when nothing matches; never returns an empty list.
  query(q: DirectoryQuery): DirectoryQueryResult {
    const origin = this.resolveOrigin(q.origin);
    const radiusMeters = this.clampRadius(q.radiusMeters);
    const maxResults = this.clampMaxResults(q.maxResults);
    const filters = q.filters ?? {};
    const now = q.now ?? new Date();

    const include = filters.departmentKeywords ?? [];
    const excludeDepartments = filters.excludeDepartmentKeywords ?? [];
    const excludeNames = filters.excludeNameKeywords ?? [];

    const threshold = this.clampClosingSoonThreshold(q.closingSoonThresholdMinutes);

    const matches: Array<{ exactMeters: number; result: ClinicResult }> = [];
    for (const clinic of this.clinics) {
      const distanceMeters = haversineMeters(origin.coordinate, clinic.coordinate);
      if (distanceMeters > radiusMeters) continue;

      const departments = clinic.departments.join(" / ");
      if (include.length > 0 && !containsAny(departments, include)) continue;
      if (containsAny(departments, excludeDepartments)) continue;
      if (containsAny(clinic.name, excludeNames)) continue;

      const reception = receptionStatusAt(clinic.receptionHours, now, threshold);
      if (filters.onlyAcceptingNow && reception.status !== "open" && reception.status !== "closing-soon") continue;

      matches.push({
        exactMeters: distanceMeters,
        result: {
          ...clinic,
          distanceMeters: Math.round(distanceMeters),
          receptionStatus: reception.status,
          minutesToClose: reception.minutesToClose,
          nextReceptionLabel: reception.nextReceptionLabel,
        },
      });
    }

    // Exact distance, so widening the radius never reorders clinics already inside it.
    matches.sort(
      (a, b) =>
        a.exactMeters - b.exactMeters || (a.result.id < b.result.id ? -1 : a.result.id > b.result.id ? 1 : 0),
    );

    if (matches.length === 0) {
      throw new EmptyResultError(radiusMeters, this.settings.radiusMeters.max);
    }

    return {
      origin,
      radiusMeters,
      maxResults,
      closingSoonThresholdMinutes: threshold,
      clinics: matches.slice(0, maxResults).map((m) => m.result),
    };
  }
}
