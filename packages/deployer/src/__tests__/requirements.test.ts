import { describe, it, expect } from "vitest";
import { ResolutionError } from "@agentport/shared";
import {
  findDuplicateNames,
  normalizeName,
  parseRequirementLine,
  parseRequirements,
  renderRequirements,
} from "../resolver/requirements.js";

const ANNOTATED_EXPORT = `# This file was autogenerated by uv via the following command:
#    uv export --no-hashes --no-dev
-e .
aiohttp==3.10.5
    # via
    #   google-adk
anyio==4.4.0 ; python_version >= "3.10"
    # via httpx
google-cloud-aiplatform[adk,agent-engines]==1.71.0
    # via sample-agent (pyproject.toml)
`;

const HASHED_EXPORT = `pydantic==2.9.2 \\
    --hash=sha256:aaaa \\
    --hash=sha256:bbbb
typing-extensions==4.12.2 \\
    --hash=sha256:cccc
`;

describe("parseRequirementLine", () => {
  it("splits name, extras, constraint and marker", () => {
    expect(parseRequirementLine(`uvicorn[standard]==0.30.6 ; python_version >= "3.10"`)).toEqual({
      name: "uvicorn",
      extras: ["standard"],
      constraint: "==0.30.6",
      marker: `python_version >= "3.10"`,
    });
  });

  it("skips comments, blanks and option lines", () => {
    expect(parseRequirementLine("# via httpx")).toBeUndefined();
    expect(parseRequirementLine("   ")).toBeUndefined();
    expect(parseRequirementLine("-e .")).toBeUndefined();
    expect(parseRequirementLine("--index-url https://example.test/simple")).toBeUndefined();
  });

  it("skips local path requirements", () => {
    expect(parseRequirementLine("./libs/foo")).toBeUndefined();
    expect(parseRequirementLine("../shared-tools")).toBeUndefined();
    expect(parseRequirementLine("file:///work/libs/foo")).toBeUndefined();
  });

  it("drops inline comments", () => {
    expect(parseRequirementLine("requests==2.32.3  # pinned")).toEqual({ name: "requests", constraint: "==2.32.3" });
  });

  it("rejects lines that are not requirements", () => {
    expect(() => parseRequirementLine("==1.0")).toThrow(ResolutionError);
  });
});

describe("parseRequirements", () => {
  it("flattens an annotated export and drops the editable self entry", () => {
    const manifest = parseRequirements(ANNOTATED_EXPORT);
    expect(renderRequirements(manifest)).toBe(
      [
        "aiohttp==3.10.5",
        `anyio==4.4.0 ; python_version >= "3.10"`,
        "google-cloud-aiplatform[adk,agent-engines]==1.71.0",
        "",
      ].join("\n"),
    );
  });

  it("removes hashes from continuation lines", () => {
    const manifest = parseRequirements(HASHED_EXPORT);
    expect(manifest.entries).toEqual([
      { name: "pydantic", constraint: "==2.9.2" },
      { name: "typing-extensions", constraint: "==4.12.2" },
    ]);
  });

  it("excludes named packages using normalised names", () => {
    const manifest = parseRequirements("Sample_Agent==0.1.0\nhttpx==0.27.2\npytest==8.3.3\n", {
      exclude: ["sample-agent", "pytest"],
    });
    expect(manifest.entries.map((e) => e.name)).toEqual(["httpx"]);
  });

  it("drops path dependencies and keeps the rest of the export", () => {
    const text = "google-adk==1.0.0\n./libs/foo\n    # via agent\nrequests==2.32.3\n";
    expect(parseRequirements(text).entries).toEqual([
      { name: "google-adk", constraint: "==1.0.0" },
      { name: "requests", constraint: "==2.32.3" },
    ]);
  });

  it("collapses identical duplicates", () => {
    const manifest = parseRequirements("httpx==0.27.2\nHTTPX==0.27.2\n");
    expect(manifest.entries).toHaveLength(1);
  });

  it("rejects conflicting duplicates", () => {
    expect(() => parseRequirements("httpx==0.27.2\nhttpx==0.28.0\n")).toThrow(/Conflicting requirements for httpx/);
  });
});

describe("normalizeName / findDuplicateNames", () => {
  it("treats runs of separators and case as equivalent", () => {
    expect(normalizeName("Google_Cloud.AIPlatform")).toBe("google-cloud-aiplatform");
  });

  it("reports duplicate names in a hand-built manifest", () => {
    expect(
      findDuplicateNames({
        entries: [
          { name: "a-b", constraint: "==1" },
          { name: "A_B", constraint: "==2" },
          { name: "c", constraint: "==1" },
        ],
      }),
    ).toEqual(["a-b"]);
  });
});
