import { describe, expect, it } from "vitest";
import { extractStructureStats } from "../src/stats/structureStats";
import { SAMPLE_DOCUMENT } from "./helpers";

describe("structure stats", () => {
  it("counts sections, paragraphs and tables", () => {
    expect(extractStructureStats(SAMPLE_DOCUMENT)).toEqual({ sections: 3, paragraphs: 2, tables: 1 });
  });

  it("reads raw bytes", () => {
    expect(extractStructureStats(Buffer.from(SAMPLE_DOCUMENT, "utf8"))).toEqual({
      sections: 3,
      paragraphs: 2,
      tables: 1
    });
  });

  it("treats a document without sections as empty", () => {
    expect(extractStructureStats("{}")).toEqual({ sections: 0, paragraphs: 0, tables: 0 });
  });

  it("returns null for payloads that are not documents", () => {
    expect(extractStructureStats("not json")).toBeNull();
    expect(extractStructureStats("[1, 2]")).toBeNull();
    expect(extractStructureStats(JSON.stringify({ sections: [{ content: [1] }] }))).toBeNull();
    expect(extractStructureStats(JSON.stringify({ sections: null }))).toBeNull();
  });
});
