/*
Directory Keyword Contract
- The directory is NOT a medical authority.
- Keywords only narrow the list; they never rank or score clinics.

This file maps recommended department labels (as produced by the
recommendation step, Japanese or English) to the department keywords the
clinic dataset uses.
- Longer, more specific keywords are listed first.
- Unknown labels fall back to general internal medicine.
*/

type DepartmentEntry = Readonly<{ keyword: string; aliases: readonly string[] }>;

const DEPARTMENTS: readonly DepartmentEntry[] = [
  { keyword: "呼吸器内科", aliases: ["pulmonology", "respiratory medicine"] },
  { keyword: "消化器内科", aliases: ["gastroenterology"] },
  { keyword: "循環器内科", aliases: ["cardiology"] },
  { keyword: "腎臓内科", aliases: ["nephrology"] },
  { keyword: "糖尿病内科", aliases: ["endocrinology", "diabetology"] },
  { keyword: "脳神経内科", aliases: ["neurology"] },
  { keyword: "脳神経外科", aliases: ["neurosurgery"] },
  { keyword: "心療内科", aliases: ["psychosomatic medicine"] },
  { keyword: "精神科", aliases: ["psychiatry"] },
  { keyword: "整形外科", aliases: ["orthopedics", "orthopaedics", "orthopedic surgery"] },
  { keyword: "耳鼻咽喉科", aliases: ["otolaryngology", "ent"] },
  { keyword: "皮膚科", aliases: ["dermatology"] },
  { keyword: "小児科", aliases: ["pediatrics", "paediatrics"] },
  { keyword: "婦人科", aliases: ["gynecology", "gynaecology", "obstetrics"] },
  { keyword: "泌尿器科", aliases: ["urology"] },
  { keyword: "眼科", aliases: ["ophthalmology"] },
  { keyword: "外科", aliases: ["general surgery", "surgery"] },
  { keyword: "内科", aliases: ["internal medicine", "general medicine", "primary care", "family medicine"] },
];

export const FALLBACK_DEPARTMENT_KEYWORD = "内科";

export const MENTAL_HEALTH_KEYWORDS: readonly string[] = ["心療内科", "精神科", "メンタル"];

// Home-visit providers do not take walk-in patients.
export const HOME_VISIT_NAME_KEYWORDS: readonly string[] = ["在宅", "訪問", "ホームケア"];

function normalizeLabel(s: string): string {
  return s.normalize("NFKC").replace(/\s+/g, " ").trim().toLowerCase();
}

function matches(label: string, entry: DepartmentEntry): boolean {
  if (label.includes(entry.keyword)) return true;
  return entry.aliases.some((alias) => new RegExp(`\\b${alias}\\b`).test(label));
}

export function departmentKeywordsFor(departmentLabels: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of departmentLabels) {
    if (typeof raw !== "string" || !raw.trim()) continue;
    const label = normalizeLabel(raw);
    for (const entry of DEPARTMENTS) {
      if (matches(label, entry) && !out.includes(entry.keyword)) out.push(entry.keyword);
    }
  }
  return out.length > 0 ? out : [FALLBACK_DEPARTMENT_KEYWORD];
}

export function isMentalHealthKeyword(keyword: string): boolean {
  return MENTAL_HEALTH_KEYWORDS.some((k) => keyword.includes(k));
}

// Mental-health departments are filtered out unless one was recommended.
export function excludedDepartmentKeywordsFor(keywords: readonly string[]): string[] {
  return keywords.some(isMentalHealthKeyword) ? [] : [...MENTAL_HEALTH_KEYWORDS];
}
