import { describe, expect, it } from "vitest";

import { findClosing, parseEntries, parseMarker, scanTemplate, splitTopLevel } from "../scanner.js";

describe("scanTemplate", () => {
  it("should split text and markers", () => {
    expect(scanTemplate("tmux split-window {direction} -c {cwd}")).toEqual([
      { kind: "text", text: "tmux split-window " },
      { kind: "marker", body: "direction" },
      { kind: "text", text: " -c " },
      { kind: "marker", body: "cwd" },
    ]);
  });

  it("should keep nested markers inside one body", () => {
    expect(scanTemplate("{a_{b_{c}}}!")).toEqual([
      { kind: "marker", body: "a_{b_{c}}" },
      { kind: "text", text: "!" },
    ]);
  });

  it("should turn doubled braces into literal braces", () => {
    expect(scanTemplate("awk '{{print $1}}'")).toEqual([{ kind: "text", text: "awk '{print $1}'" }]);
  });

  it("should copy shell and tmux format groups verbatim", () => {
    expect(scanTemplate("echo ${HOME} #{pane_id}")).toEqual([
      { kind: "text", text: "echo ${HOME} #{pane_id}" },
    ]);
  });

  it("should keep an unbalanced brace as text", () => {
    expect(scanTemplate("echo {oops")).toEqual([{ kind: "text", text: "echo {oops" }]);
  });
});

describe("parseMarker", () => {
  it("should parse plain and required values", () => {
    expect(parseMarker("target")).toEqual({ kind: "value", name: "target", required: false });
    expect(parseMarker("target!")).toEqual({ kind: "value", name: "target", required: true });
  });

  it("should parse conditionals with and without a body", () => {
    expect(parseMarker("?x:A{x}B")).toEqual({ kind: "conditional", field: "x", body: "A{x}B" });
    expect(parseMarker("?x")).toEqual({ kind: "conditional", field: "x" });
  });

  it("should keep colons inside nested markers out of the conditional split", () => {
    expect(parseMarker("?{a:b}:c")).toEqual({ kind: "conditional", field: "{a:b}", body: "c" });
  });

  it("should parse lookup tables", () => {
    expect(parseMarker("direction[left:-h -b,right:-h,default:-v]")).toEqual({
      kind: "lookup",
      name: "direction",
      required: false,
      entries: [
        { key: "left", value: "-h -b" },
        { key: "right", value: "-h" },
        { key: "default", value: "-v" },
      ],
    });
  });
});

describe("scanner helpers", () => {
  it("should find the matching closing brace", () => {
    expect(findClosing("{a{b}c}d", 0)).toBe(6);
    expect(findClosing("{a{b}c", 0)).toBe(-1);
  });

  it("should split outside braces only", () => {
    expect(splitTopLevel("a,{b,c},d", ",")).toEqual(["a", "{b,c}", "d"]);
  });

  it("should map entries without a colon to themselves", () => {
    expect(parseEntries("left, right:-h,")).toEqual([
      { key: "left", value: "left" },
      { key: "right", value: "-h" },
    ]);
  });

  it("should keep colons after the first in entry values", () => {
    expect(parseEntries("win:-t :1")).toEqual([{ key: "win", value: "-t :1" }]);
  });
});
