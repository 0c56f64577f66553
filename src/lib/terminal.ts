import readline from "readline";
import { StatusBarRenderer } from "./status-bar";

export type TerminalStream = NodeJS.WritableStream & { isTTY?: boolean };

export interface TerminalRendererOptions {
  stream?: TerminalStream;
  /** Also mirror the status into the terminal window title. */
  windowTitle?: boolean;
  prefix?: string;
}

/** Keeps the status on a single rewritten line, like a tray title. */
export function createTerminalRenderer(options: TerminalRendererOptions = {}): StatusBarRenderer {
  const stream = options.stream ?? process.stdout;
  const prefix = options.prefix ?? "";
  let current = "";

  const drawLine = (text: string) => {
    if (stream.isTTY) {
      readline.cursorTo(stream, 0);
      readline.clearLine(stream, 0);
      stream.write(text);
    } else {
      stream.write(`${text}\n`);
    }
  };

  return {
    setTitle(title) {
      current = `${prefix}${title}`;
      if (options.windowTitle && stream.isTTY) {
        stream.write(`\u001b]0;${title}\u0007`);
      }
      drawLine(current);
    },
    showDetails(text) {
      if (stream.isTTY) {
        stream.write("\n");
      }
      stream.write(`${text}\n`);
      if (stream.isTTY) {
        drawLine(current);
      }
    },
  };
}
