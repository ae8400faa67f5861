import pLimit from "p-limit";
import type { Clinic } from "../domain/Clinic";
import { toAttributableFinding, type ClinicEnrichment, type SpecialistFinding } from "../domain/SpecialistFinding";
import { EnrichmentUnavailable, WorkflowSuperseded } from "../domain/WorkflowErrors";
import type { GroundedSearchResponse, GroundedSearchService } from "./GenerationClient";
import { buildSpecialistSearchPrompt } from "./PromptBuilders";
import { describeError, withTransientRetry, type RetryPolicy } from "./Resilience";

// Grounded web search for publicly listed specialists at a clinic.
// A finding is kept only when it cites at least one source page.
// "Nothing published" is a normal, empty result; provider failures are
// EnrichmentUnavailable for that clinic alone.

export function extractAttributableFindings(response: GroundedSearchResponse): SpecialistFinding[] {
  const order: string[] = [];
  const urlsByText = new Map<string, string[]>();

  for (const support of response.supports) {
    const urls = support.sourceIndices.map((i) => response.sources[i]?.uri ?? "");
    const finding = toAttributableFinding(support.text, urls);
    if (!finding) continue;

    const existing = urlsByText.get(finding.description);
    if (existing) {
      for (const u of finding.sourceUrls) if (!existing.includes(u)) existing.push(u);
    } else {
      order.push(finding.description);
      urlsByText.set(finding.description, [...finding.sourceUrls]);
    }
  }

  const findings: SpecialistFinding[] = [];
  for (const description of order) {
    const finding = toAttributableFinding(description, urlsByText.get(description) ?? []);
    if (finding) findings.push(finding);
  }
  return findings;
}

export class SpecialistSearchAdapter {
  constructor(
    private readonly search: GroundedSearchService,
    private readonly policy: RetryPolicy,
    private readonly concurrency: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async findSpecialistInfo(clinic: Clinic, signal?: AbortSignal): Promise<SpecialistFinding[]> {
    const prompt = buildSpecialistSearchPrompt({ clinic });
    let response: GroundedSearchResponse;
    try {
      response = await withTransientRetry(
        `specialist-search ${clinic.id}`,
        (s) => this.search.search({ prompt, signal: s }),
        this.policy,
        signal,
      );
    } catch (err) {
      if (err instanceof WorkflowSuperseded) throw err;
      throw new EnrichmentUnavailable(clinic.id, describeError(err), { cause: err });
    }

    const findings = extractAttributableFindings(response);
    console.log(`[Enrichment] ${clinic.id}: ${findings.length} attributable finding(s) from ${response.supports.length} statement(s)`);
    return findings;
  }

  // One clinic's failure never fails the batch.
  async enrichClinics(clinics: readonly Clinic[], signal?: AbortSignal): Promise<Record<string, ClinicEnrichment>> {
    const limit = pLimit(Math.max(1, this.concurrency));

    const entries = await Promise.all(
      clinics.map((clinic) =>
        limit(async (): Promise<[string, ClinicEnrichment]> => {
          try {
            const findings = await this.findSpecialistInfo(clinic, signal);
            return [clinic.id, { status: "found", findings, searchedAt: this.now().toISOString() }];
          } catch (err) {
            if (!(err instanceof EnrichmentUnavailable)) throw err;
            console.warn(`[Enrichment] ${clinic.id}: unavailable (${err.detail})`);
            return [clinic.id, { status: "unavailable", reason: err.userMessage, attemptedAt: this.now().toISOString() }];
          }
        }),
      ),
    );

    return Object.fromEntries(entries);
  }
}
