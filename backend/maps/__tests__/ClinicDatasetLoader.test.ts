import { resolve } from "path";
import { loadClinicDataset, parseClinicCsv, splitDepartments } from "../ClinicDatasetLoader";

describe("parseClinicCsv", () => {
  it("reads the project's English headers", () => {
    const csv = [
      "id,name,address,lat,lng,category,departments,website,mon_open,mon_close,sat_open,sat_close",
      "C1,港南クリニック,東京都港区港南1-1,35.63,139.74,clinic,内科 / 消化器内科,example.jp,900,1800,09:00,12:30",
    ].join("\n");

    const { clinics, skipped } = parseClinicCsv(csv);

    expect(skipped).toEqual([]);
    expect(clinics).toEqual([
      {
        id: "C1",
        name: "港南クリニック",
        address: "東京都港区港南1-1",
        coordinate: { lat: 35.63, lng: 139.74 },
        category: "clinic",
        departments: ["内科", "消化器内科"],
        website: "https://example.jp/",
        receptionHours: {
          mon: { start: "09:00", end: "18:00" },
          sat: { start: "09:00", end: "12:30" },
        },
      },
    ]);
  });

  it("reads open-data Japanese headers", () => {
    const csv = [
      "ID,正式名称,所在地,所在地座標（緯度）,所在地座標（経度）,機関区分,標ぼう科目_一覧,月_外来受付開始時間,月_外来受付終了時間",
      "H9,中央病院,東京都台東区1-1,35.71,139.77,1,外科、整形外科,08:30,11:00",
    ].join("\n");

    const [clinic] = parseClinicCsv(csv).clinics;

    expect(clinic?.name).toBe("中央病院");
    expect(clinic?.category).toBe("hospital");
    expect(clinic?.departments).toEqual(["外科", "整形外科"]);
    expect(clinic?.receptionHours).toEqual({ mon: { start: "08:30", end: "11:00" } });
    expect(clinic?.website).toBeUndefined();
  });

  it("skips unusable rows with their row numbers", () => {
    const csv = [
      "id,name,lat,lng",
      "A,一番クリニック,35.1,139.1",
      "B,,35.1,139.1",
      "C,三番クリニック,,139.1",
      "D,四番クリニック,95,139.1",
      "A,重複クリニック,35.2,139.2",
    ].join("\n");

    const { clinics, skipped } = parseClinicCsv(csv);

    expect(clinics.map((c) => c.id)).toEqual(["A"]);
    expect(skipped).toEqual([
      { row: 3, reason: "missing name" },
      { row: 4, reason: "missing or invalid coordinate" },
      { row: 5, reason: "missing or invalid coordinate" },
      { row: 6, reason: "duplicate id A" },
    ]);
  });

  it("assigns row-based ids when the id column is missing", () => {
    const { clinics } = parseClinicCsv("name,lat,lng\n無名クリニック,35.1,139.1\n");
    expect(clinics[0]?.id).toBe("row-2");
  });
});

describe("splitDepartments", () => {
  it("splits on common separators and dedupes", () => {
    expect(splitDepartments("内科/外科、皮膚科; 内科|眼科")).toEqual(["内科", "外科", "皮膚科", "眼科"]);
  });
});

describe("bundled dataset", () => {
  it("loads every row of data/clinics.csv", () => {
    const { clinics, skipped } = loadClinicDataset(resolve(__dirname, "../../../data/clinics.csv"));
    expect(skipped).toEqual([]);
    expect(clinics).toHaveLength(24);
  });
});
