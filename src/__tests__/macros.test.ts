import { describe, it, expect } from "vitest";
import { convertStorageOffline } from "../converter.js";

const codeMacro = (body: string, language?: string) =>
  `<ac:structured-macro ac:name="code">` +
  (language ? `<ac:parameter ac:name="language">${language}</ac:parameter>` : "") +
  `<ac:plain-text-body><![CDATA[${body}]]></ac:plain-text-body></ac:structured-macro>`;

describe("code macro", () => {
  it("fences the literal body with its language", () => {
    const html = codeMacro("if (a < b && c) {\n  run();\n}", "ts");
    expect(convertStorageOffline(html)).toBe("```ts\nif (a < b && c) {\n  run();\n}\n```");
  });

  it("keeps entity-like text literally", () => {
    expect(convertStorageOffline(codeMacro("echo &amp; &lt;done&gt;"))).toBe("```\necho &amp; &lt;done&gt;\n```");
  });

  it("renders nothing for an empty body", () => {
    expect(convertStorageOffline(codeMacro("  \n  "))).toBe("");
  });
});

describe("code macro with split CDATA", () => {
  it("joins every CDATA section of the body", () => {
    expect(convertStorageOffline(codeMacro("a]]]]><![CDATA[>b"))).toBe("```\na]]>b\n```");
  });
});

describe("callouts as blockquotes", () => {
  it("quotes title and body", () => {
    const html =
      `<ac:structured-macro ac:name="info"><ac:parameter ac:name="title">Heads up</ac:parameter>` +
      `<ac:rich-text-body><p>One</p><p>Two</p></ac:rich-text-body></ac:structured-macro>`;
    expect(convertStorageOffline(html)).toBe("> **Heads up**\n> One\n>\n> Two");
  });

  it("lifts code blocks out of the quote", () => {
    const html =
      `<ac:structured-macro ac:name="info"><ac:parameter ac:name="title">Heads up</ac:parameter>` +
      `<ac:rich-text-body><p>Before</p>${codeMacro("npm test")}<p>After</p></ac:rich-text-body>` +
      `</ac:structured-macro>`;
    expect(convertStorageOffline(html)).toBe("> **Heads up**\n> Before\n\n```\nnpm test\n```\n\n> After");
  });

  it("lifts code out of nested callouts", () => {
    const html =
      `<ac:structured-macro ac:name="note"><ac:rich-text-body><p>Outer</p>` +
      `<ac:structured-macro ac:name="tip"><ac:rich-text-body>${codeMacro("ls")}</ac:rich-text-body></ac:structured-macro>` +
      `</ac:rich-text-body></ac:structured-macro>`;
    expect(convertStorageOffline(html)).toBe("> Outer\n\n```\nls\n```");
  });
});

describe("callouts with markers", () => {
  const html =
    `<ac:structured-macro ac:name="note"><ac:rich-text-body><p>First</p></ac:rich-text-body></ac:structured-macro>` +
    `<ac:structured-macro ac:name="warning"><ac:parameter ac:name="title">Careful</ac:parameter>` +
    `<ac:rich-text-body><p>Second</p></ac:rich-text-body></ac:structured-macro>`;
  const expected = [
    "===========START CALLOUT 0==========",
    "First",
    "===========END CALLOUT 0==========",
    "",
    "===========START CALLOUT 1==========",
    "**Careful**",
    "Second",
    "===========END CALLOUT 1==========",
  ].join("\n");

  it("numbers callouts in document order", () => {
    expect(convertStorageOffline(html, { calloutStyle: "markers" })).toBe(expected);
  });

  it("restarts numbering for every conversion", () => {
    convertStorageOffline(html, { calloutStyle: "markers" });
    expect(convertStorageOffline(html, { calloutStyle: "markers" })).toBe(expected);
  });

  it("keeps code fences inside marker callouts", () => {
    const out = convertStorageOffline(
      `<ac:structured-macro ac:name="info"><ac:rich-text-body>${codeMacro("ls")}</ac:rich-text-body></ac:structured-macro>`,
      { calloutStyle: "markers" }
    );
    expect(out).toBe("===========START CALLOUT 0==========\n```\nls\n```\n===========END CALLOUT 0==========");
  });
});

describe("other macros", () => {
  it("links jira issues to the issue tracker", () => {
    const html = `<p><ac:structured-macro ac:name="jira"><ac:parameter ac:name="key">ABC-12</ac:parameter></ac:structured-macro></p>`;
    expect(convertStorageOffline(html, { issueTrackerBaseUrl: "https://jira.example.com/" })).toBe(
      "[ABC-12](https://jira.example.com/browse/ABC-12)"
    );
  });

  it("renders the bare issue key without an issue tracker", () => {
    const html = `<p><ac:structured-macro ac:name="jira"><ac:parameter ac:name="key">ABC-12</ac:parameter></ac:structured-macro></p>`;
    expect(convertStorageOffline(html)).toBe("ABC-12");
  });

  it("renders the children of unknown macros", () => {
    const html =
      `<ac:structured-macro ac:name="expand"><ac:parameter ac:name="title">More</ac:parameter>` +
      `<ac:rich-text-body><p>Hidden text</p></ac:rich-text-body></ac:structured-macro>`;
    expect(convertStorageOffline(html)).toBe("More\n\nHidden text");
  });
});
