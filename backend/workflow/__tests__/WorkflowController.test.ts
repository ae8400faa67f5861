import type { GroundedSearchResponse } from "../../ai/GenerationClient";
import {
  EmptyResultError,
  SessionLost,
  StageTransitionError,
  ValidationError,
  WorkflowSuperseded,
} from "../../domain/WorkflowErrors";
import { WorkflowStage } from "../../domain/WorkflowStage";
import { StatusError, rejectionOf } from "../../__tests__/support/fakes";
import {
  QUESTIONS,
  QUESTIONS_OUTPUT,
  RECOMMENDATION_OUTPUT,
  SYMPTOM,
  createHarness,
  happyPathScript,
  stateAt,
  tokenOf,
  type Harness,
} from "../../__tests__/support/harness";

const TAMACHI = { origin: { kind: "reference", name: "田町駅" }, maxResults: 5 } as const;

const SHIBAURA_FINDING = "院長は日本消化器病学会の消化器病専門医です。";
const MITA_FINDING = "副院長は日本外科学会の外科専門医です。";

function grounded(statement: string, url: string): GroundedSearchResponse {
  return { text: statement, sources: [{ uri: url }], supports: [{ text: statement, sourceIndices: [0] }] };
}

// Drives a fresh session up to the facility list from 田町駅.
async function reachFacilityLookup(h: Harness): Promise<string> {
  const clarification = await h.controller.submitSymptom(undefined, SYMPTOM);
  const recommendation = await h.controller.submitAnswers(tokenOf(clarification), ["3日前から", "10段階で6"]);
  return tokenOf(await h.controller.lookupFacilities(tokenOf(recommendation), TAMACHI));
}

describe("WorkflowController", () => {
  it("walks a symptom through to a pre-visit note", async () => {
    const h = createHarness(happyPathScript(), {
      "芝浦内科クリニック": [grounded(SHIBAURA_FINDING, "https://shibaura-naika.example.jp/doctor")],
    });

    const clarification = await h.controller.submitSymptom(undefined, SYMPTOM);
    expect(clarification.step).toBe(WorkflowStage.Clarification);
    expect(stateAt(clarification, WorkflowStage.Clarification).questions).toEqual(QUESTIONS);

    const recommendation = await h.controller.submitAnswers(tokenOf(clarification), ["3日前から", "10段階で6"]);
    const recommended = stateAt(recommendation, WorkflowStage.Recommendation);
    expect(recommended.answers).toEqual([
      { question: QUESTIONS[0], answer: "3日前から" },
      { question: QUESTIONS[1], answer: "10段階で6" },
      { question: QUESTIONS[2], answer: "" },
    ]);
    expect(recommended.recommendation.departments.map((d) => d.department)).toEqual(["消化器内科", "外科"]);

    const lookup = await h.controller.lookupFacilities(tokenOf(recommendation), TAMACHI);
    const listed = stateAt(lookup, WorkflowStage.FacilityLookup);
    expect(listed.clinics.map((c) => c.id)).toEqual(["T01", "T02", "T05", "T08", "T07"]);
    const distances = listed.clinics.map((c) => c.distanceMeters);
    expect(distances).toEqual([...distances].sort((a, b) => a - b));
    expect(listed.facilitySearch).toMatchObject({
      originLabel: "田町駅",
      radiusMeters: 2000,
      maxResults: 5,
      closingSoonThresholdMinutes: 30,
      departmentKeywords: ["消化器内科", "内科", "外科"],
      onlyAcceptingNow: false,
    });
    expect(listed.enrichment).toEqual({ kind: "not-requested" });

    const enriched = await h.controller.enrichClinics(tokenOf(lookup), ["T01"]);
    expect(enriched.step).toBe(WorkflowStage.SpecialistEnrichment);
    expect(enriched.enrichment).toEqual({
      T01: {
        status: "found",
        findings: [{ description: SHIBAURA_FINDING, sourceUrls: ["https://shibaura-naika.example.jp/doctor"] }],
        searchedAt: "2026-10-19T01:00:00.000Z",
      },
    });

    const noted = await h.controller.generateNote(tokenOf(enriched));
    const final = stateAt(noted, WorkflowStage.NoteGeneration);
    expect(final.note.text).toBe(
      [
        "P (Provocation/Palliation): 歩くと痛みが強くなる",
        "Q (Quality): not provided",
        "R (Region/Radiation): 右下腹部",
        "S (Severity): 10段階で6",
        "T (Time course): 3日前から",
      ].join("\n"),
    );
    expect(final.enrichment.kind).toBe("enriched");

    const viewed = await h.controller.view(tokenOf(noted));
    expect(viewed.step).toBe(WorkflowStage.NoteGeneration);
    expect(viewed.state).not.toHaveProperty("revision");
  });

  it("starts a fresh visit at intake", async () => {
    const h = createHarness({});
    await expect(h.controller.view(undefined)).resolves.toEqual({ resumptionToken: null, step: WorkflowStage.Intake, state: null });
  });

  it("allows the note straight after the facility list", async () => {
    const h = createHarness(happyPathScript());
    const token = await reachFacilityLookup(h);

    const noted = await h.controller.generateNote(token);

    expect(stateAt(noted, WorkflowStage.NoteGeneration).enrichment).toEqual({ kind: "not-requested" });
  });

  it("drops the recommendation and everything after it when an answer is edited", async () => {
    const h = createHarness(happyPathScript());
    const token = await reachFacilityLookup(h);

    const edited = await h.controller.editAnswer(token, 1, "10段階で8");

    const state = stateAt(edited, WorkflowStage.Clarification);
    expect(state.answers.map((a) => a.answer)).toEqual(["3日前から", "10段階で8", ""]);
    expect(state).not.toHaveProperty("recommendation");
    expect(state).not.toHaveProperty("clinics");
    expect(state).not.toHaveProperty("facilitySearch");
  });

  it("regenerates the recommendation from the edited answer when re-advancing", async () => {
    const revised = JSON.stringify({
      departments: [{ department: "内科", rationale: "痛みが強くなっているため、まず全身を診る診療科です。" }],
      disclaimer: "これは診断ではありません。",
    });
    const h = createHarness(happyPathScript({ "department-recommendation": [revised] }));
    const token = await reachFacilityLookup(h);

    const edited = await h.controller.editAnswer(token, 1, "10段階で8");
    const readvanced = await h.controller.submitAnswers(tokenOf(edited), []);

    const state = stateAt(readvanced, WorkflowStage.Recommendation);
    expect(state.answers.map((a) => a.answer)).toEqual(["3日前から", "10段階で8", ""]);
    expect(state.recommendation.departments.map((d) => d.department)).toEqual(["内科"]);

    const prompts = h.text.callsFor("department-recommendation").map((c) => c.prompt);
    expect(prompts).toHaveLength(2);
    expect(prompts[0]).toContain("10段階で6");
    expect(prompts[1]).toContain("10段階で8");
    expect(prompts[1]).not.toContain("10段階で6");
  });

  it("lets answers sent on re-advance replace stored ones", async () => {
    const h = createHarness(happyPathScript({ "department-recommendation": [RECOMMENDATION_OUTPUT] }));
    const token = await reachFacilityLookup(h);

    const edited = await h.controller.editAnswer(token, 2, "37度台");
    const readvanced = await h.controller.submitAnswers(tokenOf(edited), ["昨日から"]);

    expect(stateAt(readvanced, WorkflowStage.Recommendation).answers.map((a) => a.answer)).toEqual([
      "昨日から",
      "10段階で6",
      "37度台",
    ]);
  });

  it("rejects edits of questions that do not exist", async () => {
    const h = createHarness(happyPathScript());
    const token = tokenOf(await h.controller.submitSymptom(undefined, SYMPTOM));

    const err = await rejectionOf(h.controller.editAnswer(token, 3, "はい"), ValidationError);
    expect(err.field).toBe("index");
  });

  it("rejects more answers than questions", async () => {
    const h = createHarness(happyPathScript());
    const token = tokenOf(await h.controller.submitSymptom(undefined, SYMPTOM));

    const err = await rejectionOf(h.controller.submitAnswers(token, ["a", "b", "c", "d"]), ValidationError);
    expect(err.field).toBe("answers");
    expect(h.text.callsFor("department-recommendation")).toHaveLength(0);
  });

  it("refuses to skip stages", async () => {
    const h = createHarness(happyPathScript());

    const fromIntake = await rejectionOf(h.controller.lookupFacilities(undefined, TAMACHI), StageTransitionError);
    expect(fromIntake.current).toBe(WorkflowStage.Intake);

    const token = tokenOf(await h.controller.submitSymptom(undefined, SYMPTOM));
    const early = await rejectionOf(h.controller.generateNote(token), StageTransitionError);
    expect(early.current).toBe(WorkflowStage.Clarification);
    expect(early.attempted).toBe("generate-note");
    expect(h.text.callsFor("pqrst-note")).toHaveLength(0);
  });

  it("keeps the state unchanged when no clinic matches", async () => {
    const h = createHarness(happyPathScript());
    const clarification = await h.controller.submitSymptom(undefined, SYMPTOM);
    const token = tokenOf(await h.controller.submitAnswers(tokenOf(clarification), []));

    const err = await rejectionOf(
      h.controller.lookupFacilities(token, { origin: { kind: "coordinate", lat: 0, lng: 0 }, radiusMeters: 1000 }),
      EmptyResultError,
    );

    expect(err.nextActions).toEqual(["widen-radius", "change-origin"]);
    expect(err.radiusMeters).toBe(1000);
    const after = await h.controller.view(token);
    expect(after.step).toBe(WorkflowStage.Recommendation);
    expect(after.state).not.toHaveProperty("clinics");
  });

  it("discards a result that finishes after a restart", async () => {
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const h = createHarness({
      "clarifying-questions": [QUESTIONS_OUTPUT],
      "department-recommendation": [
        () => {
          markStarted();
          return new Promise<string>(() => undefined);
        },
      ],
    });
    const token = tokenOf(await h.controller.submitSymptom(undefined, SYMPTOM));

    const outcome = rejectionOf(h.controller.submitAnswers(token, ["昨日から"]), WorkflowSuperseded);
    await started;
    const restarted = await h.controller.restart(token);
    await outcome;

    expect(restarted).toEqual({ resumptionToken: null, step: WorkflowStage.Intake, state: null });
    expect(h.inFlight.activeCount(sessionIdOf(h, token))).toBe(0);
    // The old token now points at a session that no longer exists.
    await rejectionOf(h.controller.view(token), SessionLost);
  });

  it("discards a stale write when the session moved on during the call", async () => {
    let release: (value: string) => void = () => undefined;
    const h = createHarness({
      "clarifying-questions": [QUESTIONS_OUTPUT, QUESTIONS_OUTPUT],
      "department-recommendation": [
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          }),
      ],
    });
    const token = tokenOf(await h.controller.submitSymptom(undefined, SYMPTOM));
    const slow = rejectionOf(h.controller.submitAnswers(token, ["昨日から"]), WorkflowSuperseded);

    // Re-submitting the symptom starts a new run and aborts the outstanding call.
    const resubmitted = await h.controller.submitSymptom(token, "頭が痛い");
    release(RECOMMENDATION_OUTPUT);
    await slow;

    const current = await h.controller.view(tokenOf(resubmitted));
    expect(stateAt(current, WorkflowStage.Clarification).symptomText).toBe("頭が痛い");
  });

  it("keeps found specialist results and retries only the unavailable ones", async () => {
    const h = createHarness(happyPathScript(), {
      "芝浦内科クリニック": [grounded(SHIBAURA_FINDING, "https://shibaura-naika.example.jp/doctor")],
      "三田外科医院": [new StatusError(403), grounded(MITA_FINDING, "https://mita-geka.example.jp/staff")],
    });
    const token = await reachFacilityLookup(h);

    const first = await h.controller.enrichClinics(token, ["T01", "T02"]);
    expect(first.enrichment["T01"]?.status).toBe("found");
    expect(first.enrichment["T02"]).toEqual({
      status: "unavailable",
      reason: "Specialist information for this clinic could not be retrieved right now.",
      attemptedAt: "2026-10-19T01:00:00.000Z",
    });

    const second = await h.controller.enrichClinics(tokenOf(first), ["T02", "T01"]);

    expect(h.search.prompts).toHaveLength(3);
    expect(second.enrichment["T01"]?.status).toBe("found");
    expect(second.enrichment["T02"]).toEqual({
      status: "found",
      findings: [{ description: MITA_FINDING, sourceUrls: ["https://mita-geka.example.jp/staff"] }],
      searchedAt: "2026-10-19T01:00:00.000Z",
    });
  });

  it("only enriches clinics from the current list", async () => {
    const h = createHarness(happyPathScript());
    const token = await reachFacilityLookup(h);

    const err = await rejectionOf(h.controller.enrichClinics(token, ["U01"]), ValidationError);
    expect(err.field).toBe("clinicIds");
    expect(h.search.prompts).toHaveLength(0);
  });

  it("re-runs the recommendation from a later stage", async () => {
    const h = createHarness(happyPathScript({ "department-recommendation": [RECOMMENDATION_OUTPUT] }));
    const token = await reachFacilityLookup(h);

    const again = await h.controller.submitAnswers(token, ["3日前から", "10段階で7", "37.8度"]);

    const state = stateAt(again, WorkflowStage.Recommendation);
    expect(state.answers.map((a) => a.answer)).toEqual(["3日前から", "10段階で7", "37.8度"]);
    expect(state).not.toHaveProperty("clinics");
  });

  it("restarts cleanly from a lost session", async () => {
    const h = createHarness(happyPathScript());
    const lost = h.tokens.issue({ sid: "0e5f8a2c-7b3d-4c1e-8f9a-2b4c6d8e0f1a", step: WorkflowStage.FacilityLookup });

    await rejectionOf(h.controller.view(lost), SessionLost);
    await expect(h.controller.restart(lost)).resolves.toEqual({ resumptionToken: null, step: WorkflowStage.Intake, state: null });
    expect(h.text.calls).toHaveLength(0);
  });
});

function sessionIdOf(h: Harness, token: string): string {
  return h.tokens.decode(token).claims.sid;
}
