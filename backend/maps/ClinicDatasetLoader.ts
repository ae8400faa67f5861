import { readFileSync } from "fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { Clinic, ClinicCategory, ReceptionHours, ReceptionWindow, Weekday } from "../domain/Clinic";
import { isValidCoordinate } from "./Geo";
import { toReceptionWindow } from "./ReceptionHours";

// Static clinic dataset (CSV).
// Accepts the project's English headers and the column names used by the
// public medical-institution open data, so either export can be dropped in.

const COLUMN_ALIASES = {
  id: ["id", "ID"],
  name: ["name", "正式名称", "医療機関名称", "医療機関名", "名称"],
  address: ["address", "住所", "所在地", "所在地住所"],
  lat: ["lat", "latitude", "所在地座標（緯度）", "緯度"],
  lng: ["lng", "longitude", "所在地座標（経度）", "経度"],
  category: ["category", "機関区分"],
  departments: ["departments", "標ぼう科目_一覧", "標榜科目", "診療科目"],
  website: ["website", "url", "案内用ホームページアドレス", "ホームページ"],
} as const;

type Field = keyof typeof COLUMN_ALIASES;

const WEEKDAY_COLUMNS: ReadonlyArray<{ day: Weekday; ja: string }> = [
  { day: "mon", ja: "月" },
  { day: "tue", ja: "火" },
  { day: "wed", ja: "水" },
  { day: "thu", ja: "木" },
  { day: "fri", ja: "金" },
  { day: "sat", ja: "土" },
  { day: "sun", ja: "日" },
];

const RowsSchema = z.array(z.record(z.string()));

export type CsvRow = Readonly<Record<string, string>>;

export type ClinicDatasetParseResult = Readonly<{
  clinics: readonly Clinic[];
  skipped: ReadonlyArray<{ row: number; reason: string }>;
}>;

function pick(row: CsvRow, field: Field): string {
  for (const column of COLUMN_ALIASES[field]) {
    const v = row[column];
    if (typeof v === "string" && v.trim()) return v.trim();
  }
  return "";
}

function pickFirst(row: CsvRow, columns: readonly string[]): string {
  for (const column of columns) {
    const v = row[column];
    if (typeof v === "string" && v.trim()) return v.trim();
  }
  return "";
}

function parseCategory(raw: string): ClinicCategory {
  const v = raw.trim().toLowerCase();
  if (v === "hospital" || v === "1" || v === "病院") return "hospital";
  return "clinic";
}

export function splitDepartments(raw: string): string[] {
  const out: string[] = [];
  for (const part of raw.split(/[\/,、;|]/)) {
    const d = part.trim();
    if (d && !out.includes(d)) out.push(d);
  }
  return out;
}

function parseWebsite(raw: string): string | undefined {
  if (!raw) return undefined;
  const candidate = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
  try {
    const url = new URL(candidate);
    return url.hostname ? url.toString() : undefined;
  } catch {
    return undefined;
  }
}

function parseHours(row: CsvRow): ReceptionHours {
  const hours: Partial<Record<Weekday, ReceptionWindow>> = {};
  for (const { day, ja } of WEEKDAY_COLUMNS) {
    const window = toReceptionWindow(
      pickFirst(row, [`${day}_open`, `${ja}_外来受付開始時間`, `${ja}_診療開始時間`]),
      pickFirst(row, [`${day}_close`, `${ja}_外来受付終了時間`, `${ja}_診療終了時間`]),
    );
    if (window) hours[day] = window;
  }
  return hours;
}

export function clinicsFromRows(rows: readonly CsvRow[]): ClinicDatasetParseResult {
  const clinics: Clinic[] = [];
  const skipped: Array<{ row: number; reason: string }> = [];
  const seen = new Set<string>();

  rows.forEach((row, index) => {
    const rowNumber = index + 2; // header is row 1
    const name = pick(row, "name");
    const lat = Number(pick(row, "lat"));
    const lng = Number(pick(row, "lng"));

    if (!name) {
      skipped.push({ row: rowNumber, reason: "missing name" });
      return;
    }
    if (!pick(row, "lat") || !pick(row, "lng") || !isValidCoordinate(lat, lng)) {
      skipped.push({ row: rowNumber, reason: "missing or invalid coordinate" });
      return;
    }

    const id = pick(row, "id") || `row-${rowNumber}`;
    if (seen.has(id)) {
      skipped.push({ row: rowNumber, reason: `duplicate id ${id}` });
      return;
    }
    seen.add(id);

    const website = parseWebsite(pick(row, "website"));
    clinics.push({
      id,
      name,
      address: pick(row, "address"),
      coordinate: { lat, lng },
      category: parseCategory(pick(row, "category")),
      departments: splitDepartments(pick(row, "departments")),
      ...(website ? { website } : {}),
      receptionHours: parseHours(row),
    });
  });

  return { clinics, skipped };
}

export function parseClinicCsv(text: string): ClinicDatasetParseResult {
  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  return clinicsFromRows(RowsSchema.parse(records));
}

export function loadClinicDataset(path: string): ClinicDatasetParseResult {
  const result = parseClinicCsv(readFileSync(path, "utf-8"));
  if (result.skipped.length > 0) {
    console.warn(`[Directory] Skipped ${result.skipped.length} dataset row(s) in ${path}`);
  }
  return result;
}
