// NOTE: Clinic records are owned by the ClinicDirectory.
// - Loaded once, never mutated.
// - Workflow state references them by value (JSON-safe) and never edits them.

export type LatLng = Readonly<{ lat: number; lng: number }>;

export type ClinicCategory = "hospital" | "clinic";

export type Weekday = "mon" | "tue" | "wed" | "thu" | "fri" | "sat" | "sun";

// "HH:MM", 24h clock, Asia/Tokyo local time.
export type ReceptionWindow = Readonly<{ start: string; end: string }>;

export type ReceptionHours = Readonly<Partial<Record<Weekday, ReceptionWindow>>>;

export interface Clinic {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  readonly coordinate: LatLng;
  readonly category: ClinicCategory;
  readonly departments: readonly string[];
  readonly website?: string;
  readonly receptionHours: ReceptionHours;
}

// Timetable lookup only. This is never a wait-time or congestion estimate.
export type ReceptionStatus = "open" | "closing-soon" | "closed" | "unknown";

export interface ClinicResult extends Clinic {
  // Derived per query; not part of the dataset.
  readonly distanceMeters: number;
  readonly receptionStatus: ReceptionStatus;
  readonly minutesToClose: number | null;
  readonly nextReceptionLabel: string | null;
}

export type SearchOrigin =
  | { readonly kind: "reference"; readonly name: string }
  | { readonly kind: "coordinate"; readonly lat: number; readonly lng: number };
