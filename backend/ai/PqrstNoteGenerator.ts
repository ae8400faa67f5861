import {
  NOT_PROVIDED,
  PQRST_SECTIONS,
  renderPqrstNote,
  type PqrstNote,
  type PqrstSectionKey,
  type PqrstSections,
} from "../domain/PqrstNote";
import { OutputRejected, isRecord, strictParseJsonObject } from "./PromptBuilders";

// The note only restates what the patient said; every section is present,
// with "not provided" where the patient gave no information.

const SECTION_ALIASES: Readonly<Record<PqrstSectionKey, readonly string[]>> = {
  provocationPalliation: ["provocationPalliation", "provocation_palliation", "provocation", "P"],
  quality: ["quality", "Q"],
  regionRadiation: ["regionRadiation", "region_radiation", "region", "R"],
  severity: ["severity", "S"],
  timeCourse: ["timeCourse", "time_course", "timing", "time", "T"],
};

const EMPTY_MARKERS = new Set(["", "-", "n/a", "na", "unknown", "none provided", "not provided", "不明", "未記入", "記載なし"]);

function sectionValue(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim();
  if (Array.isArray(value)) {
    return value
      .filter((v): v is string => typeof v === "string")
      .map((v) => v.trim())
      .filter(Boolean)
      .join(" ");
  }
  return undefined;
}

export function normalizeSectionText(value: string | undefined): string {
  if (value === undefined) return NOT_PROVIDED;
  const v = value.trim();
  return EMPTY_MARKERS.has(v.toLowerCase()) ? NOT_PROVIDED : v;
}

export function parsePqrstNote(raw: string): PqrstNote {
  const obj = strictParseJsonObject(raw);
  // Some models nest the sections one level down.
  const nested = obj["sections"];
  const source = isRecord(nested) ? nested : obj;

  let recognized = 0;
  const pick = (key: PqrstSectionKey): string => {
    for (const alias of SECTION_ALIASES[key]) {
      if (alias in source) {
        recognized++;
        return normalizeSectionText(sectionValue(source[alias]));
      }
    }
    return NOT_PROVIDED;
  };

  const sections: PqrstSections = {
    provocationPalliation: pick("provocationPalliation"),
    quality: pick("quality"),
    regionRadiation: pick("regionRadiation"),
    severity: pick("severity"),
    timeCourse: pick("timeCourse"),
  };

  if (recognized === 0) {
    throw new OutputRejected(`no PQRST sections found (expected ${PQRST_SECTIONS.map((s) => s.key).join(", ")})`);
  }
  return renderPqrstNote(sections);
}
