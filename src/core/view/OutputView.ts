import type { OutputItem, OutputTag } from "../../types/engine";

export type OutputSink = (items: OutputItem[]) => void;

export class OutputView {
  private buffer: OutputItem[] = [];

  constructor(private readonly sink?: OutputSink) {}

  push(tag: OutputTag, text: string, speaker?: string): void {
    this.buffer.push(speaker === undefined ? { tag, text } : { tag, text, speaker });
  }

  pending(): readonly OutputItem[] {
    return this.buffer;
  }

  flush(): OutputItem[] {
    const items = this.buffer;
    this.buffer = [];
    if (items.length > 0 && this.sink) this.sink(items);
    return items;
  }
}
