import { describe, it, expect } from "vitest";
import { classify, classifyPrimary } from "../../src/utils/language.js";

describe("classify", () => {
  it("maps extensions case-insensitively", () => {
    expect(classify("src/app.ts")).toBe("typescript");
    expect(classify("src/App.TSX")).toBe("typescript");
    expect(classify("main.go")).toBe("go");
    expect(classify("scripts\\build.py")).toBe("python");
  });

  it("prefers special filenames over extensions", () => {
    expect(classify("docker/Dockerfile")).toBe("dockerfile");
    expect(classify("Gemfile")).toBe("ruby");
  });

  it("returns unknown for unmapped, extensionless, dotfile and empty paths", () => {
    expect(classify("assets/logo.png")).toBe("unknown");
    expect(classify("LICENSE")).toBe("unknown");
    expect(classify(".env")).toBe("unknown");
    expect(classify("")).toBe("unknown");
  });
});

describe("classifyPrimary", () => {
  it("returns the most common known language", () => {
    expect(classifyPrimary(["a.py", "b.ts", "c.py", "README"])).toBe("python");
  });

  it("breaks ties in favour of the language seen first", () => {
    expect(classifyPrimary(["a.go", "b.ts", "c.ts", "d.go"])).toBe("go");
    expect(classifyPrimary(["b.ts", "a.go", "d.go", "c.ts"])).toBe("typescript");
  });

  it("returns unknown when nothing is recognised", () => {
    expect(classifyPrimary([])).toBe("unknown");
    expect(classifyPrimary(["LICENSE", "logo.png"])).toBe("unknown");
  });
});
