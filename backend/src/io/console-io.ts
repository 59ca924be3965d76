import { createInterface, type Interface } from "node:readline";
import { GameError } from "../../../shared/errors.js";
import type { GameIO } from "./interface.js";

interface PendingAnswer {
  resolve: (line: string) => void;
  reject: (err: GameError) => void;
}

/**
 * Terminal I/O over readline. Lines are queued as they arrive, so answers
 * piped in or typed ahead of their prompt are consumed in order.
 */
export class ConsoleIO implements GameIO {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly lines: string[] = [];
  private pending: PendingAnswer | null = null;
  private inputClosed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.output = output;
    this.rl = createInterface({ input, output });
    this.rl.on("line", (line) => this.onLine(line));
    // Ctrl-D / end of piped input
    this.rl.on("close", () => this.onClose());
  }

  print(line: string = ""): void {
    this.output.write(`${line}\n`);
  }

  ask(question: string): Promise<string> {
    if (this.inputClosed) {
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.inputClosed) {
      return Promise.reject(
        new GameError("input-closed", "Input closed before an answer", question)
      );
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  close(): void {
    this.rl.close();
  }

  private onLine(line: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private onClose(): void {
    this.inputClosed = true;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(
        new GameError("input-closed", "Input closed while waiting")
      );
    }
  }
}
