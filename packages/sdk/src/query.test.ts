import { describe, it, expect } from "vitest";
import { matches, resolvePath, runPipeline } from "./query.js";
import { ValidationError } from "./errors.js";
import type { DocumentData } from "./types.js";

describe("resolvePath", () => {
  it("should get nested property", () => {
    expect(resolvePath({ body: { value: "note" } }, "body.value")).toEqual(["note"]);
  });

  it("should return nothing for a missing path", () => {
    expect(resolvePath({ body: "x" }, "target.source")).toEqual([]);
  });

  it("should traverse arrays of objects", () => {
    const obj = { target: [{ source: "a" }, { source: "b" }, { other: 1 }] };
    expect(resolvePath(obj, "target.source")).toEqual(["a", "b"]);
  });

  it("should address array elements by numeric segment", () => {
    const obj = { target: [{ source: "a" }, { source: "b" }] };
    expect(resolvePath(obj, "target.1.source")).toEqual(["b"]);
    expect(resolvePath(obj, "target.5.source")).toEqual([]);
  });
});

describe("matches", () => {
  const doc: DocumentData = {
    annotation: {
      type: "Annotation",
      motivation: ["tagging", "commenting"],
      body: { purpose: "tagging", value: "person" },
      target: [
        { source: "urn:doc:1", selector: { type: "TextAnchorSelector", start: 10, end: 20 } },
        { source: "urn:doc:2", selector: { type: "TextAnchorSelector", start: 100, end: 105 } },
      ],
      confidence: 0.7,
    },
  };

  it("should match literal equality", () => {
    expect(matches(doc, { "annotation.body.value": "person" })).toBe(true);
    expect(matches(doc, { "annotation.body.value": "place" })).toBe(false);
  });

  it("should match a literal against array elements", () => {
    expect(matches(doc, { "annotation.motivation": "tagging" })).toBe(true);
    expect(matches(doc, { "annotation.motivation": "linking" })).toBe(false);
  });

  it("should match a literal object by structure regardless of key order", () => {
    expect(
      matches(doc, { "annotation.body": { value: "person", purpose: "tagging" } })
    ).toBe(true);
  });

  it("should match $ne against every element", () => {
    expect(matches(doc, { "annotation.motivation": { $ne: "linking" } })).toBe(true);
    expect(matches(doc, { "annotation.motivation": { $ne: "tagging" } })).toBe(false);
  });

  it("should match $in and $nin", () => {
    expect(matches(doc, { "annotation.body.value": { $in: ["place", "person"] } })).toBe(true);
    expect(matches(doc, { "annotation.body.value": { $nin: ["place", "person"] } })).toBe(false);
    expect(matches(doc, { "annotation.body.value": { $nin: ["place"] } })).toBe(true);
  });

  it("should compare numbers and ignore mismatched types", () => {
    expect(matches(doc, { "annotation.confidence": { $gt: 0.5, $lte: 0.7 } })).toBe(true);
    expect(matches(doc, { "annotation.confidence": { $gt: 0.7 } })).toBe(false);
    expect(matches(doc, { "annotation.confidence": { $lt: "1" } })).toBe(false);
  });

  it("should require one element to satisfy every $elemMatch condition", () => {
    const overlapping = {
      "annotation.target": {
        $elemMatch: {
          source: "urn:doc:2",
          "selector.start": { $lt: 103 },
          "selector.end": { $gt: 101 },
        },
      },
    };
    const split = {
      "annotation.target": {
        $elemMatch: { source: "urn:doc:1", "selector.start": { $gte: 100 } },
      },
    };

    expect(matches(doc, overlapping)).toBe(true);
    expect(matches(doc, split)).toBe(false);
  });

  it("should treat a single target object as a one-element array for $elemMatch", () => {
    const single = { annotation: { target: { source: "urn:doc:3" } } };
    expect(matches(single, { "annotation.target": { $elemMatch: { source: "urn:doc:3" } } })).toBe(
      true
    );
  });

  it("should reject unknown operators", () => {
    expect(() => matches(doc, { "annotation.type": { $regex: "A" } })).toThrow(ValidationError);
    expect(() => matches(doc, { $where: "1" })).toThrow("Unknown operator: $where");
    expect(() => matches(doc, { $or: [{ "annotation.type": "Other" }] })).toThrow("Unknown operator: $or");
  });
});

describe("runPipeline", () => {
  const docs = Array.from({ length: 6 }, (_, i) => ({ _id: `d${i}`, n: i }));

  it("should apply stages in order", () => {
    const result = runPipeline(docs, [{ $match: { n: { $gte: 1 } } }, { $skip: 2 }, { $limit: 2 }]);
    expect(result.map((d) => d._id)).toEqual(["d3", "d4"]);
  });

  it("should return everything for an empty pipeline", () => {
    expect(runPipeline(docs, [])).toHaveLength(6);
  });
});
