import { ValidationError } from "../errors";

export type PromptInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface PromptOutput {
  write(text: string): unknown;
}

const BACKSPACE = new Set(["\u007f", "\b"]);
const CTRL_C = "\u0003";
const CTRL_D = "\u0004";
const ABORTED = Symbol("aborted");

interface Waiter {
  resolve: (value: string) => void;
  reject: (err: Error) => void;
}

/**
 * Reads secrets from one input stream for the lifetime of a CLI run.
 *
 * On a TTY the terminal is put in raw mode while a question is pending, so
 * nothing is echoed. Otherwise input is read line by line (pipes, CI).
 * Text past the end of an answer is kept for the next question, so
 * `printf 'pw\npw\n' | mpm create-db -d x` answers both prompts.
 */
export class PassphrasePrompt {
  private readonly lines: (string | typeof ABORTED)[] = [];
  private partial = "";
  private lastWasCr = false;
  private ended = false;
  private attached = false;
  private waiting: Waiter | null = null;

  constructor(
    private readonly input: PromptInput = process.stdin,
    private readonly output: PromptOutput = process.stdout
  ) {}

  private get tty(): boolean {
    return this.input.isTTY === true;
  }

  ask(question: string): Promise<string> {
    if (this.waiting) {
      return Promise.reject(new ValidationError("A prompt is already pending"));
    }
    this.output.write(question);
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
      this.flush();
      if (this.waiting) this.attach();
    });
  }

  /**
   * Restores the terminal and stops reading. Buffered input is discarded and a
   * pending question is rejected.
   */
  close(): void {
    this.detach();
    this.lines.length = 0;
    this.partial = "";
    const waiter = this.waiting;
    this.waiting = null;
    waiter?.reject(new ValidationError("Prompt closed"));
  }

  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    for (const ch of text) {
      if (this.lastWasCr && ch === "\n") {
        this.lastWasCr = false;
        continue;
      }
      this.lastWasCr = ch === "\r";

      if (ch === "\r" || ch === "\n" || (this.tty && ch === CTRL_D)) {
        this.lines.push(this.partial);
        this.partial = "";
      } else if (this.tty && ch === CTRL_C) {
        this.lines.push(ABORTED);
        this.partial = "";
      } else if (this.tty && BACKSPACE.has(ch)) {
        this.partial = this.partial.slice(0, -1);
      } else {
        this.partial += ch;
      }
    }
    this.flush();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.flush();
  };

  private flush(): void {
    const waiter = this.waiting;
    if (!waiter) return;

    const next = this.lines.shift();
    if (next === undefined && !this.ended) return;

    this.waiting = null;
    this.detach();
    if (this.tty) this.output.write("\n");

    if (next === ABORTED) {
      this.lines.length = 0;
      waiter.reject(new ValidationError("Aborted"));
    } else if (next !== undefined) {
      waiter.resolve(next);
    } else if (this.partial.length > 0) {
      // unterminated last line
      waiter.resolve(this.partial);
      this.partial = "";
    } else {
      waiter.reject(new ValidationError("Input ended before a passphrase was entered"));
    }
  }

  private attach(): void {
    if (this.attached || this.ended) return;
    this.attached = true;
    if (this.tty) this.input.setRawMode?.(true);
    this.input.setEncoding("utf8");
    this.input.on("data", this.onData);
    this.input.on("end", this.onEnd);
    this.input.resume();
  }

  private detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.input.removeListener("data", this.onData);
    this.input.removeListener("end", this.onEnd);
    this.input.pause();
    if (this.tty) this.input.setRawMode?.(false);
  }
}
