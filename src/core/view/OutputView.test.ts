import { describe, expect, it } from "vitest";
import type { OutputItem } from "../../types/engine";
import { OutputView } from "./OutputView";

describe("OutputView", () => {
  it("buffers items in order and hands them to the sink on flush", () => {
    const received: OutputItem[][] = [];
    const view = new OutputView((items) => received.push(items));
    view.push("triggered", "The lamp flickers.");
    view.push("dialogue", "Quiet, please.", "Keeper");

    expect(view.pending()).toHaveLength(2);
    const flushed = view.flush();

    expect(flushed).toEqual([
      { tag: "triggered", text: "The lamp flickers." },
      { tag: "dialogue", text: "Quiet, please.", speaker: "Keeper" }
    ]);
    expect(received).toEqual([flushed]);
    expect(view.pending()).toEqual([]);
  });

  it("skips the sink when nothing is buffered", () => {
    const received: OutputItem[][] = [];
    const view = new OutputView((items) => received.push(items));
    expect(view.flush()).toEqual([]);
    expect(received).toEqual([]);
  });
});
