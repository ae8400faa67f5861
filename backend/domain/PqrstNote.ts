// Clinician-facing symptom note.
// The section set is fixed: downstream consumers rely on all five labels
// being present, so a missing section is filled with NOT_PROVIDED, never omitted.

export const NOT_PROVIDED = "not provided";

export const PQRST_SECTIONS = [
  { key: "provocationPalliation", letter: "P", label: "Provocation/Palliation" },
  { key: "quality", letter: "Q", label: "Quality" },
  { key: "regionRadiation", letter: "R", label: "Region/Radiation" },
  { key: "severity", letter: "S", label: "Severity" },
  { key: "timeCourse", letter: "T", label: "Time course" },
] as const;

export type PqrstSectionKey = (typeof PQRST_SECTIONS)[number]["key"];

export type PqrstSections = Readonly<Record<PqrstSectionKey, string>>;

export interface PqrstNote {
  readonly sections: PqrstSections;
  // Rendered form, one "<letter> (<label>): <value>" line per section.
  readonly text: string;
}

export function renderPqrstNote(sections: PqrstSections): PqrstNote {
  const text = PQRST_SECTIONS.map((s) => `${s.letter} (${s.label}): ${sections[s.key]}`).join("\n");
  return { sections, text };
}
