import {
  departmentKeywordsFor,
  excludedDepartmentKeywordsFor,
  FALLBACK_DEPARTMENT_KEYWORD,
  MENTAL_HEALTH_KEYWORDS,
} from "../DepartmentKeywordMap";

describe("departmentKeywordsFor", () => {
  it("keeps recommendation order and includes broader matches", () => {
    expect(departmentKeywordsFor(["消化器内科", "外科"])).toEqual(["消化器内科", "内科", "外科"]);
  });

  it("maps English labels to dataset keywords", () => {
    expect(departmentKeywordsFor(["Gastroenterology"])).toEqual(["消化器内科"]);
    expect(departmentKeywordsFor(["Internal Medicine"])).toEqual(["内科"]);
  });

  it("ignores full-width spacing", () => {
    expect(departmentKeywordsFor(["整形　外科"])).toEqual(["外科"]);
  });

  it("falls back to internal medicine", () => {
    expect(departmentKeywordsFor([])).toEqual([FALLBACK_DEPARTMENT_KEYWORD]);
    expect(departmentKeywordsFor(["Astrology"])).toEqual([FALLBACK_DEPARTMENT_KEYWORD]);
  });
});

describe("excludedDepartmentKeywordsFor", () => {
  it("excludes mental-health departments by default", () => {
    expect(excludedDepartmentKeywordsFor(["内科"])).toEqual([...MENTAL_HEALTH_KEYWORDS]);
  });

  it("keeps them when one was recommended", () => {
    expect(excludedDepartmentKeywordsFor(departmentKeywordsFor(["心療内科"]))).toEqual([]);
  });
});
