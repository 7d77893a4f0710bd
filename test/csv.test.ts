import { describe, expect, it } from "vitest";
import { csvRecords, parseCsv } from "../src/rag/csv.js";

describe("parseCsv", () => {
  it("splits rows and cells", () => {
    expect(parseCsv("a,b\n1,2\n")).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
  });

  it("handles quoted separators, doubled quotes and CRLF endings", () => {
    expect(parseCsv('"x, y","he said ""hi"""\r\nlast,row')).toEqual([
      ["x, y", 'he said "hi"'],
      ["last", "row"],
    ]);
  });

  it("keeps line breaks inside quoted fields", () => {
    expect(parseCsv('note\n"line one\nline two"\n')).toEqual([["note"], ["line one\nline two"]]);
  });

  it("skips blank lines but keeps rows of empty cells", () => {
    expect(parseCsv("a,b\n\n,\n\n")).toEqual([
      ["a", "b"],
      ["", ""],
    ]);
  });
});

describe("csvRecords", () => {
  it("strips a byte order mark and trims header names", () => {
    const { header, records } = csvRecords("\uFEFFwiki , yt\nhttps://a.example,\n");
    expect(header).toEqual(["wiki", "yt"]);
    expect(records).toEqual([{ wiki: "https://a.example", yt: "" }]);
  });

  it("fills missing trailing cells with empty strings", () => {
    expect(csvRecords("a,b,c\n1\n").records).toEqual([{ a: "1", b: "", c: "" }]);
  });

  it("returns nothing for empty input", () => {
    expect(csvRecords("")).toEqual({ header: [], records: [] });
  });
});
