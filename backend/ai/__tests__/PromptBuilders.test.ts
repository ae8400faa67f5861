import { makeClinic } from "../../__tests__/support/fakes";
import {
  OutputRejected,
  buildDepartmentRecommendationPrompt,
  buildSpecialistSearchPrompt,
  stableJsonStringify,
  strictParseJsonObject,
  withStricterOutputRules,
} from "../PromptBuilders";

describe("strictParseJsonObject", () => {
  it("parses a bare object", () => {
    expect(strictParseJsonObject('{"questions":["a"]}')).toEqual({ questions: ["a"] });
  });

  it("unwraps a markdown fence", () => {
    expect(strictParseJsonObject('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it("finds an object surrounded by prose", () => {
    expect(strictParseJsonObject('Here is the result: {"a": {"b": 2}} Hope this helps.')).toEqual({ a: { b: 2 } });
  });

  it("rejects empty output", () => {
    expect(() => strictParseJsonObject("   ")).toThrow(new OutputRejected("empty output"));
  });

  it("rejects arrays and plain text", () => {
    expect(() => strictParseJsonObject("[1, 2]")).toThrow("output was not a JSON object");
    expect(() => strictParseJsonObject("I cannot help with that.")).toThrow("output was not a JSON object");
  });
});

describe("prompt builders", () => {
  it("serializes keys in a stable order", () => {
    expect(stableJsonStringify({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } })).toBe('{"a":{"c":[3,{"e":5,"f":4}],"d":2},"b":1}');
  });

  it("marks skipped answers explicitly", () => {
    const prompt = buildDepartmentRecommendationPrompt({
      symptomText: "頭が痛い",
      answers: [
        { question: "いつからですか？", answer: "昨日から" },
        { question: "熱はありますか？", answer: "  " },
      ],
    });

    expect(prompt).toContain(
      '{"answers":[{"answer":"昨日から","question":"いつからですか？"},{"answer":"(skipped)","question":"熱はありますか？"}],"symptomText":"頭が痛い"}',
    );
  });

  it("puts the clinic identity into the specialist search prompt", () => {
    const prompt = buildSpecialistSearchPrompt({
      clinic: makeClinic({ id: "x", coordinate: { lat: 35, lng: 139 }, name: "芝浦内科クリニック" }),
    });
    expect(prompt).toContain('"name":"芝浦内科クリニック"');
    expect(prompt).toContain('"website":null');
  });

  it("appends the rejection reason on the stricter re-prompt", () => {
    const stricter = withStricterOutputRules("BASE PROMPT\n", "empty output");
    expect(stricter.startsWith("BASE PROMPT\n")).toBe(true);
    expect(stricter).toContain("PREVIOUS ATTEMPT REJECTED: empty output\n");
  });
});
