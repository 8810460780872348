import { describe, expect, it } from "vitest";
import { loadQueries, parseQueryList } from "../src/lib/queries";

describe("parseQueryList", () => {
  it("ignores comments and blank lines", () => {
    const input = "# header\n\nrestaurant robotics startup\r\n  \n# note\n  kitchen robot  \n";
    expect(parseQueryList(input)).toEqual(["restaurant robotics startup", "kitchen robot"]);
  });
});

describe("loadQueries", () => {
  it("fails when the file is missing", () => {
    expect(() => loadQueries("/nonexistent/queries.txt")).toThrow("Queries file not found: /nonexistent/queries.txt");
  });
});
