import { Writable } from "stream";
import { describe, expect, it } from "vitest";
import { createTerminalRenderer, TerminalStream } from "../src/lib/terminal";

function collectingStream(isTTY: boolean): { stream: TerminalStream; output: () => string } {
  const chunks: string[] = [];
  const writable = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream: Object.assign(writable, { isTTY }), output: () => chunks.join("") };
}

describe("createTerminalRenderer", () => {
  it("prints one line per update when not attached to a terminal", () => {
    const { stream, output } = collectingStream(false);
    const renderer = createTerminalRenderer({ stream, windowTitle: true, prefix: "usage " });

    renderer.setTitle("⏳");
    renderer.setTitle("K: 65%");
    renderer.showDetails("report");

    expect(output()).toBe("usage ⏳\nusage K: 65%\nreport\n");
  });

  it("rewrites the current line and the window title on a terminal", () => {
    const { stream, output } = collectingStream(true);
    const renderer = createTerminalRenderer({ stream, windowTitle: true });

    renderer.setTitle("K: 65%");

    expect(output()).toBe("\u001b]0;K: 65%\u0007\u001b[1G\u001b[2KK: 65%");
  });

  it("redraws the status after printing details on a terminal", () => {
    const { stream, output } = collectingStream(true);
    const renderer = createTerminalRenderer({ stream });

    renderer.setTitle("B: 42%");
    renderer.showDetails("report");

    expect(output()).toBe("\u001b[1G\u001b[2KB: 42%\nreport\n\u001b[1G\u001b[2KB: 42%");
  });
});
