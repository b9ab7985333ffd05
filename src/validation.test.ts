import { describe, it, expect } from "vitest";
import { z } from "zod";
import { describeIssues, formatIssuePath } from "./validation.js";

describe("formatIssuePath", () => {
  it("joins keys with dots and brackets indices", () => {
    expect(formatIssuePath(["mappings", 2, "variants", 0])).toBe("mappings[2].variants[0]");
    expect(formatIssuePath(["server", "port"])).toBe("server.port");
    expect(formatIssuePath([])).toBe("");
  });
});

describe("describeIssues", () => {
  const schema = z.object(
    {
      name: z.string({ invalid_type_error: "must be a string" }),
      ports: z.array(z.number({ invalid_type_error: "must be a number" })),
    },
    { invalid_type_error: "expected an object" },
  );

  it("quotes the path in front of each message", () => {
    const result = schema.safeParse({ name: 1, ports: [80, "x", "y"] });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(describeIssues(result.error.issues)).toEqual([
      '"name" must be a string',
      '"ports[1]" must be a number',
      '"ports[2]" must be a number',
    ]);
  });

  it("leaves root issues unprefixed", () => {
    const result = schema.safeParse("nope");
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(describeIssues(result.error.issues)).toEqual(["expected an object"]);
  });
});
