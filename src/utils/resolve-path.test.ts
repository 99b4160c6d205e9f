import { homedir } from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { expandHome, resolvePath } from "./resolve-path";

describe("expandHome", () => {
  it("expands a lone tilde", () => {
    expect(expandHome("~")).toBe(homedir());
  });

  it("expands a tilde followed by a separator", () => {
    expect(expandHome("~/astro/m31")).toBe(path.join(homedir(), "astro/m31"));
  });

  it("leaves ~user and embedded tildes alone", () => {
    expect(expandHome("~other/data")).toBe("~other/data");
    expect(expandHome("/data/~/x")).toBe("/data/~/x");
  });
});

describe("resolvePath", () => {
  it("resolves relative paths against the given cwd", () => {
    expect(resolvePath("night-1", "/data/m31")).toBe("/data/m31/night-1");
  });

  it("normalizes dot segments", () => {
    expect(resolvePath("lights/../darks/./", "/data")).toBe("/data/darks");
  });

  it("keeps absolute paths", () => {
    expect(resolvePath("/data/m31", "/elsewhere")).toBe("/data/m31");
  });

  it("expands home before resolving", () => {
    expect(resolvePath("~/m31", "/elsewhere")).toBe(path.join(homedir(), "m31"));
  });

  it("does not require the path to exist", () => {
    expect(resolvePath("/no/such/output")).toBe("/no/such/output");
  });
});
