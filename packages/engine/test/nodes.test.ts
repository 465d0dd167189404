import { describe, expect, test } from "vitest";

import { SectionNode, StringWriter, ValueNode, escapeHtml, stringifyValue, type Node } from "../src/index.js";
import { root, section, text, value } from "./_helpers/tree.js";

function run(node: Node, ...scopes: unknown[]): string {
  return node.execute(new StringWriter(), scopes).toString();
}

describe("ValueNode", () => {
  test("writes the resolved value followed by the trailing text", () => {
    expect(run(value("name", "!"), { name: "Ada" })).toBe("Ada!");
  });

  test("escapes HTML by default", () => {
    expect(run(value("html"), { html: `<a href="x">'&'</a>` })).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;",
    );
  });

  test("writes raw text when escaping is off", () => {
    const node = value("html", undefined, { escape: false });
    expect(node.kind).toBe("&");
    expect(run(node, { html: "<b>bold</b>" })).toBe("<b>bold</b>");
  });

  test("writes nothing for absent values but still writes trailing text", () => {
    expect(run(value("missing", "|"), {})).toBe("|");
    expect(run(value("nil", "|"), { nil: null })).toBe("|");
  });

  test("stringifies non-string values", () => {
    expect(run(value("n"), { n: 0 })).toBe("0");
    expect(run(value("b"), { b: false })).toBe("false");
  });

  test("null-prototype objects are written without failing", () => {
    expect(run(value("v", "|"), { v: Object.create(null) })).toBe("[object Object]|");
  });

  test("duplicates keep the escape setting and share the binding", () => {
    const original = value("html", "-", { escape: false });
    const copy = original.duplicate();

    expect(copy).toBeInstanceOf(ValueNode);
    expect(copy.escape).toBe(false);
    expect(copy.kind).toBe("&");
    expect(run(copy, { html: "<i>" })).toBe("<i>-");
  });
});

describe("SectionNode", () => {
  const body = (): Node[] => [text("["), value("."), text("]")];

  test("renders once per array element with the element as innermost scope", () => {
    expect(run(section("items", body()), { items: ["a", "b", "c"] })).toBe("[a][b][c]");
  });

  test("an empty array renders only the trailing text", () => {
    expect(run(section("items", body(), "end"), { items: [] })).toBe("end");
  });

  test.each([
    ["undefined", {}],
    ["null", { flag: null }],
    ["false", { flag: false }],
    ["empty string", { flag: "" }],
  ])("%s renders only the trailing text", (_label, scope) => {
    expect(run(section("flag", body(), "."), scope)).toBe(".");
  });

  test("true renders the body in the current scope", () => {
    const scope = { flag: true, name: "Ada" };
    expect(run(section("flag", [value("name")]), scope)).toBe("Ada");
  });

  test("objects are pushed as the new innermost scope", () => {
    const scope = { name: "outer", person: { name: "inner" } };
    const tree = section("person", [value("name"), text("/"), value("title")]);

    expect(run(tree, { title: "Dr", ...scope })).toBe("inner/Dr");
  });

  test("zero is a value", () => {
    expect(run(section("count", body()), { count: 0 })).toBe("[0]");
  });

  test("nested sections see every enclosing scope", () => {
    const tree = section("groups", [
      value("label", ":"),
      section("members", [value("."), text(","), value("label")]),
      text(";"),
    ]);
    const scope = {
      groups: [
        { label: "x", members: ["a", "b"] },
        { label: "y", members: ["c"] },
      ],
    };

    expect(run(tree, scope)).toBe("x:a,xb,x;y:c,y;");
  });

  test("duplicates share children with the source", () => {
    const original = section("items", body(), "!");
    const copy = original.duplicate();

    expect(copy).toBeInstanceOf(SectionNode);
    expect(copy.getChildren()).toBe(original.getChildren());
    expect(run(copy, { items: [1] })).toBe("[1]!");
  });

  test("renders inside a root alongside other nodes", () => {
    const tree = root([text("Hi "), value("name", ", "), section("tags", [value(".", " ")])], "bye");
    expect(run(tree, { name: "Ada", tags: ["x", "y"] })).toBe("Hi Ada, x y bye");
  });

  test("sections without a handler never render their body", () => {
    const node = new SectionNode({ name: "items" });
    node.append("-");
    expect(run(node, { items: [1, 2] })).toBe("-");
  });
});

describe("stringifyValue", () => {
  test("matches String for ordinary values", () => {
    expect(stringifyValue("s")).toBe("s");
    expect(stringifyValue(12)).toBe("12");
    expect(stringifyValue([1, 2])).toBe("1,2");
    expect(stringifyValue({ toString: () => "custom" })).toBe("custom");
  });

  test("honours Symbol.toPrimitive on null-prototype objects", () => {
    const value: object = Object.assign(Object.create(null), { [Symbol.toPrimitive]: () => "prim" });
    expect(stringifyValue(value)).toBe("prim");
  });

  test("falls back to the object tag", () => {
    expect(stringifyValue(Object.create(null))).toBe("[object Object]");
  });
});

describe("escapeHtml", () => {
  test("escapes the five special characters", () => {
    expect(escapeHtml(`&<>"'`)).toBe("&amp;&lt;&gt;&quot;&#x27;");
  });

  test("leaves other text alone", () => {
    expect(escapeHtml("plain text")).toBe("plain text");
  });
});
