import { describe, it, expect, vi } from "vitest";
import { SourceError } from "../errors.js";
import { resolveInvocation } from "../invocation.js";
import { createMockFs } from "../testing/mock-fs.js";
import type { InvocationParameters } from "../types.js";
import { describeRequest, runInvocation } from "./run-invocation.js";

const DECLARATION = "<?xml version='1.0' encoding='UTF-8'?>";
const FILE = "/data/config.xml";

async function run(
  content: string,
  params: Omit<InvocationParameters, "path">,
  now?: () => Date
) {
  const fs = createMockFs({ [FILE]: content });
  const outcome = await runInvocation(
    resolveInvocation({ path: FILE, ...params }),
    { fs, now }
  );
  return { fs, outcome };
}

describe("runInvocation", () => {
  it("adds children and writes the file", async () => {
    const { fs, outcome } = await run("<root><a/></root>", {
      xpath: "/root/a",
      addChildren: ["b", { c: "text" }]
    });

    expect(outcome).toEqual({
      changed: true,
      message: "Added 2 children to 1 element at /root/a",
      matchCount: 1,
      echoed: { xpath: "/root/a", namespaces: {}, disposition: "present" }
    });
    expect(fs.getContent(FILE)).toBe(
      `${DECLARATION}\n<root><a><b/><c>text</c></a></root>\n`
    );
  });

  it("deletes an attribute", async () => {
    const { fs, outcome } = await run('<root a="1"/>', {
      xpath: "/root/@a",
      state: "absent"
    });

    expect(outcome.changed).toBe(true);
    expect(outcome.echoed).toEqual({
      xpath: "/root/@a",
      namespaces: {},
      disposition: "absent"
    });
    expect(fs.getContent(FILE)).toBe(`${DECLARATION}\n<root/>\n`);
  });

  it("leaves the file byte-identical when nothing changes", async () => {
    const original = '<?xml version="1.0"?>\n<root   a="1" ></root>';
    const { fs, outcome } = await run(original, {
      xpath: "/root/@missing",
      state: "absent"
    });

    expect(outcome.changed).toBe(false);
    expect(outcome.matchCount).toBe(0);
    expect(fs.writes).toEqual([]);
    expect(fs.getContent(FILE)).toBe(original);
  });

  it("counts without writing", async () => {
    const original = "<root><item/><item/><item/></root>";
    const { fs, outcome } = await run(original, { xpath: "//item", count: true });

    expect(outcome).toEqual({
      changed: false,
      message: "Found 3 matches for //item",
      matchCount: 3,
      echoed: { xpath: "//item", namespaces: {}, disposition: "present" }
    });
    expect(fs.writes).toEqual([]);
  });

  it("prints matches", async () => {
    const { outcome } = await run("<root><item/><item/></root>", {
      xpath: "//item",
      printMatch: true
    });

    expect(outcome.matches).toEqual(["/root/item[1]", "/root/item[2]"]);
  });

  it("reads content", async () => {
    const { outcome } = await run("<root><name>x</name></root>", {
      xpath: "/root/name",
      content: "text"
    });

    expect(outcome.content).toEqual([{ tag: "name", text: "x" }]);
  });

  it("reports a change for setChildren even when nothing differs", async () => {
    const original = "<root><list><a/></list></root>";
    const { fs, outcome } = await run(original, {
      xpath: "/root/list",
      setChildren: ["a"]
    });

    expect(outcome.changed).toBe(true);
    expect(fs.getContent(FILE)).toBe(`${DECLARATION}\n${original}\n`);
  });

  it("reports no change when a value is already set", async () => {
    const original = "<root><name>same</name></root>";
    const { fs, outcome } = await run(original, { xpath: "/root/name", value: "same" });

    expect(outcome.changed).toBe(false);
    expect(fs.writes).toEqual([]);
  });

  it("does not write on a dry run", async () => {
    const original = '<root a="1"/>';
    const { fs, outcome } = await run(original, {
      xpath: "/root/@a",
      state: "absent",
      dryRun: true
    });

    expect(outcome.changed).toBe(true);
    expect(outcome.message).toBe("Deleted 1 match at /root/@a");
    expect(fs.writes).toEqual([]);
    expect(fs.getContent(FILE)).toBe(original);
  });

  it("pretty prints written documents", async () => {
    const { fs } = await run("<root><a/></root>", {
      xpath: "/root/a",
      addChildren: ["b"],
      prettyPrint: true
    });

    expect(fs.getContent(FILE)).toBe(
      `${DECLARATION}\n<root>\n  <a>\n    <b/>\n  </a>\n</root>\n`
    );
  });

  it("backs up the original before writing", async () => {
    const original = "<root><name>old</name></root>";
    const { fs, outcome } = await run(
      original,
      { xpath: "/root/name", value: "new", backup: true },
      () => new Date("2024-01-02T03:04:05.678Z")
    );

    const backupFile = `${FILE}.backup-2024-01-02T03-04-05-678Z`;
    expect(outcome.backupFile).toBe(backupFile);
    expect(fs.writes.map((write) => write.path)).toEqual([backupFile, FILE]);
    expect(fs.getContent(backupFile)).toBe(original);
    expect(fs.getContent(FILE)).toBe(
      `${DECLARATION}\n<root><name>new</name></root>\n`
    );
  });

  it("returns the result for inline sources", async () => {
    const fs = createMockFs();
    const outcome = await runInvocation(
      resolveInvocation({
        xml: "<root><item/></root>",
        xpath: "/root/item",
        attribute: "id",
        value: "1"
      }),
      { fs }
    );

    expect(outcome.xmlString).toBe(`${DECLARATION}\n<root><item id="1"/></root>\n`);
    expect(fs.writes).toEqual([]);
  });

  it("returns inline sources unchanged when nothing changes", async () => {
    const xml = "<root><item/></root>";
    const outcome = await runInvocation(
      resolveInvocation({ xml, xpath: "//missing", state: "absent" }),
      { fs: createMockFs() }
    );

    expect(outcome.xmlString).toBe(xml);
  });

  it("echoes namespaces", async () => {
    const { fs, outcome } = await run('<root xmlns:ex="urn:example"><ex:item/></root>', {
      xpath: "//e:item",
      namespaces: { e: "urn:example" },
      count: true
    });

    expect(outcome.matchCount).toBe(1);
    expect(outcome.echoed.namespaces).toEqual({ e: "urn:example" });
    expect(fs.writes).toEqual([]);
  });

  it("fails when the source file is missing", async () => {
    const invocation = resolveInvocation({
      path: "/missing.xml",
      xpath: "/root",
      count: true
    });

    await expect(runInvocation(invocation, { fs: createMockFs() })).rejects.toThrow(
      new SourceError("XML source /missing.xml does not exist.")
    );
  });

  it("fails on malformed documents", async () => {
    await expect(run("<root><a></root>", { xpath: "/root", count: true })).rejects.toMatchObject({
      kind: "parse"
    });
  });

  it("leaves a malformed file untouched instead of repairing it", async () => {
    const original = "<root><a></b><c>keep</c></root>";
    const fs = createMockFs({ [FILE]: original });

    await expect(
      runInvocation(resolveInvocation({ path: FILE, xpath: "/root", value: "t" }), { fs })
    ).rejects.toMatchObject({ kind: "parse" });
    expect(fs.getContent(FILE)).toBe(original);
    expect(fs.writes).toEqual([]);
  });

  it("rejects a document whose root is never closed", async () => {
    const original = "<root><a/>";
    const fs = createMockFs({ [FILE]: original });

    await expect(
      runInvocation(
        resolveInvocation({ path: FILE, xpath: "/root", addChildren: ["b"] }),
        { fs }
      )
    ).rejects.toMatchObject({ kind: "parse" });
    expect(fs.getContent(FILE)).toBe(original);
    expect(fs.writes).toEqual([]);
  });

  it("creates a missing attribute", async () => {
    const { fs, outcome } = await run("<root/>", {
      xpath: "/root",
      attribute: "id",
      value: "1"
    });

    expect(outcome.changed).toBe(true);
    expect(fs.getContent(FILE)).toBe(`${DECLARATION}\n<root id="1"/>\n`);
  });

  it("throws mutation failures", async () => {
    await expect(
      run("<root/>", { xpath: "/root", state: "absent" })
    ).rejects.toMatchObject({
      kind: "mutation",
      message: "Cannot delete <root>: it is the document root."
    });
  });

  it("notifies observers", async () => {
    const onStart = vi.fn();
    const onComplete = vi.fn();
    const onError = vi.fn();
    const fs = createMockFs({ [FILE]: '<root a="1"/>' });

    const outcome = await runInvocation(
      resolveInvocation({ path: FILE, xpath: "/root/@a", state: "absent" }),
      { fs, observers: { onStart, onComplete, onError } }
    );

    const details = { kind: "delete", label: "Delete /root/@a", source: FILE };
    expect(onStart).toHaveBeenCalledWith(details);
    expect(onComplete).toHaveBeenCalledWith(details, outcome);
    expect(onError).not.toHaveBeenCalled();
  });

  it("notifies observers of failures", async () => {
    const onError = vi.fn();
    const invocation = resolveInvocation({ xml: "<root/>", xpath: "/root[", count: true });

    await expect(
      runInvocation(invocation, { fs: createMockFs(), observers: { onError } })
    ).rejects.toMatchObject({ kind: "selector" });
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toEqual({
      kind: "count",
      label: "Count /root[",
      source: "<inline xml>"
    });
  });
});

describe("describeRequest", () => {
  it("labels each request", () => {
    expect(describeRequest({ kind: "setValue", value: "x", attribute: "id" }, "/a")).toBe(
      "Set attribute id on /a"
    );
    expect(
      describeRequest(
        { kind: "addChildren", children: [], inputType: "yaml", position: "before" },
        "/a"
      )
    ).toBe("Insert siblings before /a");
    expect(describeRequest({ kind: "content", content: "attribute" }, "/a")).toBe(
      "Read attribute content of /a"
    );
  });
});
