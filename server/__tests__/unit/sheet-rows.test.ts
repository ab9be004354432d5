import { describe, it, expect } from "vitest";
import { columnLetter, parseUnimportedRows } from "../../pipeline/sheet-rows.js";

describe("columnLetter", () => {
  it.each([
    [0, "A"],
    [25, "Z"],
    [26, "AA"],
    [27, "AB"],
    [51, "AZ"],
    [52, "BA"],
    [701, "ZZ"],
    [702, "AAA"],
  ])("should map index %d to %s", (index, expected) => {
    expect(columnLetter(index)).toBe(expected);
  });
});

describe("parseUnimportedRows", () => {
  const headers = ["Project Name", "Video 1", "Video 2", "Imported"];

  it("should return nothing for a header-only sheet", () => {
    expect(parseUnimportedRows([headers])).toEqual([]);
    expect(parseUnimportedRows([])).toEqual([]);
  });

  it("should skip blank and already imported rows and keep sheet row numbers", () => {
    const rows = parseUnimportedRows([
      headers,
      ["Baking", "https://youtu.be/aaaaaaaaaaa", "", ""],
      ["", "", "", ""],
      ["Gardening", "https://youtu.be/bbbbbbbbbbb", "", "2024-01-01 10:00:00 UTC"],
      ["  Chess  ", " https://youtu.be/ccccccccccc ", "https://youtu.be/ddddddddddd"],
    ]);

    expect(rows).toEqual([
      {
        rowNumber: 2,
        projectName: "Baking",
        videoUrls: ["https://youtu.be/aaaaaaaaaaa", "", "", "", "", "", ""],
      },
      {
        rowNumber: 5,
        projectName: "Chess",
        videoUrls: ["https://youtu.be/ccccccccccc", "https://youtu.be/ddddddddddd", "", "", "", "", ""],
      },
    ]);
  });

  it("should keep rows without a project name for the caller to report", () => {
    const rows = parseUnimportedRows([headers, ["", "https://youtu.be/aaaaaaaaaaa"]]);
    expect(rows).toEqual([
      { rowNumber: 2, projectName: "", videoUrls: ["https://youtu.be/aaaaaaaaaaa", "", "", "", "", "", ""] },
    ]);
  });
});
