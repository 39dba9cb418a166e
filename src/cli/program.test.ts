import { describe, it, expect } from "vitest";
import { Volume, createFsFromVolume } from "memfs";
import type { FileSystem } from "@xpath-edit/xml-mutations";
import { createProgram, parseChildren } from "./program.js";

const DECLARATION = "<?xml version='1.0' encoding='UTF-8'?>";

function createMemFs(files: Record<string, string> = {}) {
  const vol = Volume.fromJSON(files, "/");
  const promises = createFsFromVolume(vol).promises;
  const fs: FileSystem = {
    readFile: async (path, encoding) => String(await promises.readFile(path, encoding)),
    writeFile: (path, content, options) => promises.writeFile(path, content, options)
  };
  return { vol, fs };
}

function setup(files: Record<string, string> = {}) {
  const { vol, fs } = createMemFs(files);
  const messages: string[] = [];
  const output: string[] = [];
  const program = createProgram({
    fs,
    env: { cwd: "/work" },
    stdout: (text) => output.push(text),
    logger: (message) => messages.push(message),
    now: () => new Date("2024-05-06T07:08:09.010Z"),
    suppressCommanderOutput: true
  });
  const run = (...args: string[]) => program.parseAsync(["node", "xpath-edit", ...args]);
  const read = (path: string) => vol.readFileSync(path, "utf8").toString();
  return { vol, messages, output, run, read };
}

describe("createProgram", () => {
  it("adds children to the selected element", async () => {
    const { messages, run, read } = setup({ "/work/doc.xml": "<root><a/></root>" });

    await run("--path", "doc.xml", "--xpath", "/root/a", "--add-children", "[b, {c: text}]");

    expect(read("/work/doc.xml")).toBe(
      `${DECLARATION}\n<root><a><b/><c>text</c></a></root>\n`
    );
    expect(messages).toEqual(["Added 2 children to 1 element at /root/a"]);
  });

  it("deletes attributes with --state absent", async () => {
    const { run, read } = setup({ "/work/doc.xml": '<root a="1"/>' });

    await run("-p", "/work/doc.xml", "-x", "/root/@a", "--state", "absent");

    expect(read("/work/doc.xml")).toBe(`${DECLARATION}\n<root/>\n`);
  });

  it("leaves the file alone when nothing matches", async () => {
    const original = '<root a="1"></root>';
    const { messages, run, read } = setup({ "/work/doc.xml": original });

    await run("-p", "doc.xml", "-x", "/root/@missing", "--state", "absent");

    expect(read("/work/doc.xml")).toBe(original);
    expect(messages).toEqual(["Nothing to delete at /root/@missing"]);
  });

  it("prints the outcome as JSON", async () => {
    const { output, run } = setup({
      "/work/doc.xml": "<root><item/><item/><item/></root>"
    });

    await run("-p", "doc.xml", "-x", "//item", "--count", "--json");

    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0] ?? "")).toEqual({
      changed: false,
      message: "Found 3 matches for //item",
      matchCount: 3,
      echoed: { xpath: "//item", namespaces: {}, disposition: "present" }
    });
  });

  it("collects namespace prefixes", async () => {
    const { output, run } = setup({
      "/work/doc.xml": '<root xmlns:ex="urn:example"><ex:item/><item/></root>'
    });

    await run(
      "-p", "doc.xml",
      "-x", "//e:item",
      "-n", "e=urn:example",
      "-n", "other=urn:other",
      "--count",
      "--json"
    );

    const outcome: unknown = JSON.parse(output[0] ?? "");
    expect(outcome).toMatchObject({
      matchCount: 1,
      echoed: { namespaces: { e: "urn:example", other: "urn:other" } }
    });
  });

  it("rejects malformed namespace arguments", async () => {
    const { run } = setup({ "/work/doc.xml": "<root/>" });

    await expect(run("-p", "doc.xml", "-x", "/root", "-n", "broken")).rejects.toMatchObject({
      code: "commander.invalidArgument"
    });
  });

  it("lists matches", async () => {
    const { messages, run } = setup({
      "/work/doc.xml": "<root><item/><item/></root>"
    });

    await run("-p", "doc.xml", "-x", "//item", "--print-match");

    expect(messages).toEqual([
      "Found 2 matches for //item",
      "/root/item[1]",
      "/root/item[2]"
    ]);
  });

  it("reports attribute content", async () => {
    const { messages, run } = setup({
      "/work/doc.xml": '<root><item id="1" kind="a"/></root>'
    });

    await run("-p", "doc.xml", "-x", "/root/item", "--content", "attribute");

    expect(messages).toEqual([
      "Found 1 match for /root/item",
      'item: id="1" kind="a"'
    ]);
  });

  it("sets attribute values", async () => {
    const { run, read } = setup({ "/work/doc.xml": "<root><item/></root>" });

    await run("-p", "doc.xml", "-x", "/root/item", "-a", "id", "--value", "7");

    expect(read("/work/doc.xml")).toBe(`${DECLARATION}\n<root><item id="7"/></root>\n`);
  });

  it("clears text with --clear-value", async () => {
    const { run, read } = setup({ "/work/doc.xml": "<root><name>old</name></root>" });

    await run("-p", "doc.xml", "-x", "/root/name", "--clear-value");

    expect(read("/work/doc.xml")).toBe(`${DECLARATION}\n<root><name/></root>\n`);
  });

  it("rejects --value together with --clear-value", async () => {
    const { run } = setup({ "/work/doc.xml": "<root/>" });

    await expect(
      run("-p", "doc.xml", "-x", "/root", "--value", "x", "--clear-value")
    ).rejects.toMatchObject({
      name: "CliError",
      isUserError: true,
      message: "--value and --clear-value are mutually exclusive."
    });
  });

  it("reports engine failures as user errors", async () => {
    const { run } = setup({ "/work/doc.xml": "<root/>" });

    await expect(run("-p", "doc.xml", "-x", "/root", "--state", "absent")).rejects.toMatchObject({
      name: "CliError",
      isUserError: true,
      message: "Cannot delete <root>: it is the document root."
    });
  });

  it("reports invalid children as user errors", async () => {
    const { run } = setup({ "/work/doc.xml": "<root/>" });

    await expect(
      run("-p", "doc.xml", "-x", "/root", "--add-children", "[b, {c: 1, d: 2}]")
    ).rejects.toMatchObject({
      isUserError: true,
      message: "Invalid child 2: mappings must have exactly one key, found 2."
    });
  });

  it("reports missing files as user errors", async () => {
    const { run } = setup();

    await expect(run("-p", "missing.xml", "-x", "/root", "--count")).rejects.toMatchObject({
      isUserError: true,
      message: "XML source /work/missing.xml does not exist."
    });
  });

  it("does not write on a dry run", async () => {
    const original = '<root a="1"/>';
    const { messages, run, read } = setup({ "/work/doc.xml": original });

    await run("-p", "doc.xml", "-x", "/root/@a", "--state", "absent", "--dry-run");

    expect(read("/work/doc.xml")).toBe(original);
    expect(messages).toEqual(["Dry run: Deleted 1 match at /root/@a"]);
  });

  it("writes a backup before changing the file", async () => {
    const original = "<root><name>old</name></root>";
    const { messages, run, read } = setup({ "/work/doc.xml": original });

    await run("-p", "doc.xml", "-x", "/root/name", "--value", "new", "--backup");

    expect(read("/work/doc.xml.backup-2024-05-06T07-08-09-010Z")).toBe(original);
    expect(messages).toEqual([
      "Updated text on 1 element at /root/name",
      "Backup: /work/doc.xml.backup-2024-05-06T07-08-09-010Z"
    ]);
  });

  it("prints changed inline documents", async () => {
    const { output, run } = setup();

    await run("--xml", "<root/>", "-x", "/root", "--add-children", "[child]");

    expect(output).toEqual([`${DECLARATION}\n<root><child/></root>\n`]);
  });

  it("accepts XML fragments as children", async () => {
    const { run, read } = setup({ "/work/doc.xml": "<root/>" });

    await run(
      "-p", "doc.xml",
      "-x", "/root",
      "--input-type", "xml",
      "--add-children", '<x id="1"><y/></x>'
    );

    expect(read("/work/doc.xml")).toBe(`${DECLARATION}\n<root><x id="1"><y/></x></root>\n`);
  });

  it("logs invocation progress when verbose", async () => {
    const { messages, run } = setup({ "/work/doc.xml": '<root a="1"/>' });

    await run("-p", "doc.xml", "-x", "/root/@a", "--state", "absent", "--verbose");

    expect(messages).toEqual([
      "[xpath-edit] Delete /root/@a in /work/doc.xml",
      "[xpath-edit] Delete /root/@a: 1 matched, changed",
      "Deleted 1 match at /root/@a"
    ]);
  });

  it("reads parameters from a task file", async () => {
    const { run, read } = setup({
      "/work/doc.xml": "<root><name>old</name></root>",
      "/work/tasks/rename.yaml": [
        "path: ../doc.xml",
        "xpath: /root/name",
        "value: new",
        ""
      ].join("\n")
    });

    await run("--task", "tasks/rename.yaml");

    expect(read("/work/doc.xml")).toBe(`${DECLARATION}\n<root><name>new</name></root>\n`);
  });

  it("lets flags override the task file", async () => {
    const { run, read } = setup({
      "/work/doc.xml": "<root><name>old</name></root>",
      "/work/task.json": JSON.stringify({ path: "doc.xml", xpath: "/root/name", value: "new" })
    });

    await run("--task", "task.json", "--value", "flag");

    expect(read("/work/doc.xml")).toBe(`${DECLARATION}\n<root><name>flag</name></root>\n`);
  });

  it("lets a source flag replace the task file's source", async () => {
    const { output, run, read } = setup({
      "/work/doc.xml": "<root/>",
      "/work/task.yaml": "path: doc.xml\nxpath: /root\nvalue: hi\n"
    });

    await run("--task", "task.yaml", "--xml", "<root><a/></root>");

    expect(output).toEqual([`${DECLARATION}\n<root>hi<a/></root>\n`]);
    expect(read("/work/doc.xml")).toBe("<root/>");
  });

  it("lets an edit flag replace the task file's edit", async () => {
    const { run, read } = setup({
      "/work/doc.xml": "<root><a/></root>",
      "/work/task.yaml": "path: doc.xml\nxpath: /root/a\nvalue: hi\n"
    });

    await run("--task", "task.yaml", "--set-children", "[b]");

    expect(read("/work/doc.xml")).toBe(`${DECLARATION}\n<root><a><b/></a></root>\n`);
  });

  it("logs failures when verbose", async () => {
    const { messages, run } = setup({ "/work/doc.xml": "<root/>" });

    await expect(
      run("-p", "doc.xml", "-x", "/root", "--state", "absent", "--verbose")
    ).rejects.toMatchObject({ message: "Cannot delete <root>: it is the document root." });
    expect(messages).toEqual([
      "[xpath-edit] Delete /root in /work/doc.xml",
      "[xpath-edit] Delete /root failed: Cannot delete <root>: it is the document root."
    ]);
  });

  it("rejects malformed documents without rewriting them", async () => {
    const original = "<root><a></b></root>";
    const { run, read } = setup({ "/work/doc.xml": original });

    await expect(run("-p", "doc.xml", "-x", "/root", "--value", "t")).rejects.toMatchObject({
      isUserError: true
    });
    expect(read("/work/doc.xml")).toBe(original);
  });
});

describe("parseChildren", () => {
  it("wraps a single YAML entry in a list", () => {
    expect(parseChildren("b", "yaml")).toEqual(["b"]);
    expect(parseChildren("{c: text}", "yaml")).toEqual([{ c: "text" }]);
  });

  it("keeps a single XML fragment as is", () => {
    expect(parseChildren("<x/>", "xml")).toEqual(["<x/>"]);
  });

  it("reads lists of XML fragments", () => {
    expect(parseChildren("['<x/>', '<y/>']", "xml")).toEqual(["<x/>", "<y/>"]);
  });

  it("rejects malformed YAML", () => {
    expect(() => parseChildren("[b, {", "yaml")).toThrow(/^Invalid children YAML: /);
  });
});
