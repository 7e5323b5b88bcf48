import { findJsonObject } from "../../src/analysis/findJsonObject";

describe("findJsonObject", () => {
  it("parses a bare object", () => {
    expect(findJsonObject('{"github_valid":true}')).toEqual({ github_valid: true });
  });

  it("finds the object inside prose", () => {
    const reply = 'I checked the repository.\n{"github_url":null,"relevance_score":0}\nDone.';

    expect(findJsonObject(reply)).toEqual({ github_url: null, relevance_score: 0 });
  });

  it("finds the object inside a fenced block", () => {
    expect(findJsonObject('Result:\n```json\n{"codebase_summary":"ok"}\n```')).toEqual({ codebase_summary: "ok" });
  });

  it("ignores braces inside strings and keeps nested objects", () => {
    const reply = 'Answer: {"meta":{"files":2},"codebase_summary":"uses {curly} braces"}';

    expect(findJsonObject(reply)).toEqual({ meta: { files: 2 }, codebase_summary: "uses {curly} braces" });
  });

  it("skips braces in prose that are not JSON", () => {
    const reply = 'The repo exposes {train, eval} scripts.\n{"relevance_score":7}';

    expect(findJsonObject(reply)).toEqual({ relevance_score: 7 });
  });

  it("handles escaped quotes inside strings", () => {
    expect(findJsonObject('{"codebase_summary":"a \\"quoted\\" } brace"}')).toEqual({
      codebase_summary: 'a "quoted" } brace',
    });
  });

  it("returns undefined when there is no object", () => {
    expect(findJsonObject("No JSON here")).toBeUndefined();
    expect(findJsonObject("")).toBeUndefined();
    expect(findJsonObject("[1, 2]")).toBeUndefined();
    expect(findJsonObject("{unterminated")).toBeUndefined();
  });
});
