/**
 * Terminal output utilities.
 *
 * `renderTerminal` replays a raw PTY stream through a small screen emulator
 * so that text redrawn in place (spinners, cursor-positioned tables, cleared
 * screens) ends up exactly as a terminal would show it.
 */

/* eslint-disable no-control-regex */

/** Escape sequences and control bytes that never produce visible text */
const ESCAPES = {
  csi: /\x1B\[[0-?]*[ -\/]*[@-~]/,
  osc: /\x1B\][^\x07\x1B]*(?:\x07|\x1B\\)/,
  // DCS, PM and APC strings run until ST
  stringCommand: /\x1B[P^_][^\x1B]*\x1B\\/,
  singleByte: /\x1B[@-Z\\-_]/,
  // C0 controls and DEL, except \t \n \r
  control: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/,
} as const;

const ESCAPE_RE = new RegExp(
  Object.values(ESCAPES)
    .map((re) => re.source)
    .join("|"),
  "g",
);

/** Visible text of a PTY chunk without any cursor or style handling */
export function stripAnsi(input: string): string {
  return input.replace(ESCAPE_RE, "");
}

// ---------------------------------------------------------------------------
// Screen emulator
// ---------------------------------------------------------------------------

export interface ScreenSize {
  cols: number;
  rows: number;
}

export const DEFAULT_SCREEN_SIZE: ScreenSize = { cols: 160, rows: 50 };

type ParserState = "ground" | "escape" | "charset" | "csi" | "osc" | "oscEscape" | "string" | "stringEscape";

const BLANK = " ";
const ESC = "\x1B";

export class TerminalScreen {
  private readonly cols: number;
  private readonly rows: number;
  private grid: string[][];
  /** Rows scrolled off the top, oldest first */
  private scrollback: string[][] = [];
  private row = 0;
  private col = 0;
  private saved: { row: number; col: number } = { row: 0, col: 0 };
  private state: ParserState = "ground";
  private csiBuffer = "";

  constructor(size: ScreenSize = DEFAULT_SCREEN_SIZE) {
    this.cols = Math.max(1, size.cols);
    this.rows = Math.max(1, size.rows);
    this.grid = Array.from({ length: this.rows }, () => this.blankRow());
  }

  write(data: string): void {
    for (const ch of data) {
      this.feed(ch);
    }
  }

  /** Scrollback plus visible rows, trailing blanks trimmed, trailing empty rows dropped */
  toText(): string {
    const lines = [...this.scrollback, ...this.grid].map((cells) => cells.join("").trimEnd());
    while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
    return lines.join("\n");
  }

  private feed(ch: string): void {
    switch (this.state) {
      case "ground":
        this.ground(ch);
        return;
      case "escape":
        this.escape(ch);
        return;
      case "charset":
        // ESC ( B and friends: the designator byte is consumed and ignored
        this.state = "ground";
        return;
      case "csi":
        this.csi(ch);
        return;
      case "osc":
        if (ch === "\x07") this.state = "ground";
        else if (ch === ESC) this.state = "oscEscape";
        return;
      case "oscEscape":
        this.state = ch === "\\" ? "ground" : "osc";
        return;
      case "string":
        if (ch === ESC) this.state = "stringEscape";
        return;
      case "stringEscape":
        this.state = ch === "\\" ? "ground" : "string";
        return;
    }
  }

  private ground(ch: string): void {
    switch (ch) {
      case ESC:
        this.state = "escape";
        return;
      case "\r":
        this.col = 0;
        return;
      case "\n":
      case "\x0B":
      case "\x0C":
        // Output post-processing on a PTY turns LF into CR LF
        this.col = 0;
        this.lineFeed();
        return;
      case "\b":
        this.col = Math.max(0, Math.min(this.col, this.cols - 1) - 1);
        return;
      case "\t":
        this.col = Math.min(this.cols - 1, (Math.floor(this.col / 8) + 1) * 8);
        return;
    }
    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f || (code >= 0x80 && code < 0xa0)) return;
    this.put(ch);
  }

  private escape(ch: string): void {
    this.state = "ground";
    switch (ch) {
      case "[":
        this.state = "csi";
        this.csiBuffer = "";
        return;
      case "]":
        this.state = "osc";
        return;
      case "P":
      case "^":
      case "_":
      case "X":
        this.state = "string";
        return;
      case "(":
      case ")":
      case "*":
      case "+":
        this.state = "charset";
        return;
      case "7":
        this.saveCursor();
        return;
      case "8":
        this.restoreCursor();
        return;
      case "D":
        this.lineFeed();
        return;
      case "E":
        this.col = 0;
        this.lineFeed();
        return;
      case "M":
        this.row = Math.max(0, this.row - 1);
        return;
      case "c":
        this.reset();
        return;
    }
  }

  private csi(ch: string): void {
    const code = ch.charCodeAt(0);
    if (code >= 0x20 && code <= 0x3f) {
      this.csiBuffer += ch;
      return;
    }
    this.state = "ground";
    if (code < 0x40 || code > 0x7e) return;

    // Private-mode sequences (ESC [ ? 25 l etc.) never move the cursor
    if (/^[?<=>]/.test(this.csiBuffer)) return;
    const params = this.csiBuffer
      .replace(/[ -/]/g, "")
      .split(";")
      .map((p) => (p === "" ? NaN : parseInt(p, 10)));
    const arg = (index: number, fallback: number) => {
      const value = params[index];
      return value === undefined || Number.isNaN(value) ? fallback : value;
    };
    const count = Math.max(1, arg(0, 1));

    switch (ch) {
      case "A":
        this.moveTo(this.row - count, this.col);
        break;
      case "B":
      case "e":
        this.moveTo(this.row + count, this.col);
        break;
      case "C":
      case "a":
        this.moveTo(this.row, this.col + count);
        break;
      case "D":
        this.moveTo(this.row, Math.min(this.col, this.cols - 1) - count);
        break;
      case "E":
        this.moveTo(this.row + count, 0);
        break;
      case "F":
        this.moveTo(this.row - count, 0);
        break;
      case "G":
      case "`":
        this.moveTo(this.row, count - 1);
        break;
      case "d":
        this.moveTo(count - 1, this.col);
        break;
      case "H":
      case "f":
        this.moveTo(Math.max(1, arg(0, 1)) - 1, Math.max(1, arg(1, 1)) - 1);
        break;
      case "J":
        this.eraseDisplay(arg(0, 0));
        break;
      case "K":
        this.eraseLine(arg(0, 0));
        break;
      case "X":
        this.fill(this.row, this.col, Math.min(this.cols, this.col + count));
        break;
      case "P":
        this.deleteChars(count);
        break;
      case "@":
        this.insertChars(count);
        break;
      case "s":
        this.saveCursor();
        break;
      case "u":
        this.restoreCursor();
        break;
      default:
        // SGR (m) and every other attribute / mode sequence is discarded
        break;
    }
  }

  // -------------------------------------------------------------------------
  // Grid operations
  // -------------------------------------------------------------------------

  private blankRow(): string[] {
    return new Array<string>(this.cols).fill(BLANK);
  }

  private currentRow(): string[] {
    const row = this.grid[this.row];
    if (row) return row;
    const fresh = this.blankRow();
    this.grid[this.row] = fresh;
    return fresh;
  }

  private put(ch: string): void {
    if (this.col >= this.cols) {
      this.col = 0;
      this.lineFeed();
    }
    this.currentRow()[this.col] = ch;
    this.col += 1;
  }

  private lineFeed(): void {
    if (this.row < this.rows - 1) {
      this.row += 1;
      return;
    }
    const top = this.grid.shift();
    if (top) this.scrollback.push(top);
    this.grid.push(this.blankRow());
  }

  private moveTo(row: number, col: number): void {
    this.row = Math.min(this.rows - 1, Math.max(0, row));
    this.col = Math.min(this.cols - 1, Math.max(0, col));
  }

  private fill(row: number, from: number, to: number): void {
    const cells = this.grid[row];
    if (!cells) return;
    for (let c = Math.max(0, from); c < Math.min(this.cols, to); c++) cells[c] = BLANK;
  }

  private eraseLine(mode: number): void {
    const col = Math.min(this.col, this.cols - 1);
    if (mode === 0) this.fill(this.row, col, this.cols);
    else if (mode === 1) this.fill(this.row, 0, col + 1);
    else if (mode === 2) this.fill(this.row, 0, this.cols);
  }

  private eraseDisplay(mode: number): void {
    if (mode === 0) {
      this.eraseLine(0);
      for (let r = this.row + 1; r < this.rows; r++) this.fill(r, 0, this.cols);
    } else if (mode === 1) {
      for (let r = 0; r < this.row; r++) this.fill(r, 0, this.cols);
      this.eraseLine(1);
    } else if (mode === 2 || mode === 3) {
      for (let r = 0; r < this.rows; r++) this.fill(r, 0, this.cols);
      if (mode === 3) this.scrollback = [];
    }
  }

  private deleteChars(count: number): void {
    const cells = this.currentRow();
    const col = Math.min(this.col, this.cols - 1);
    cells.splice(col, count);
    while (cells.length < this.cols) cells.push(BLANK);
  }

  private insertChars(count: number): void {
    const cells = this.currentRow();
    const col = Math.min(this.col, this.cols - 1);
    cells.splice(col, 0, ...new Array<string>(count).fill(BLANK));
    cells.length = this.cols;
  }

  private saveCursor(): void {
    this.saved = { row: this.row, col: this.col };
  }

  private restoreCursor(): void {
    this.moveTo(this.saved.row, this.saved.col);
  }

  private reset(): void {
    this.grid = Array.from({ length: this.rows }, () => this.blankRow());
    this.scrollback = [];
    this.row = 0;
    this.col = 0;
  }
}

/** Replays raw terminal output and returns the text left on screen. */
export function renderTerminal(raw: string | Uint8Array, size: ScreenSize = DEFAULT_SCREEN_SIZE): string {
  const text = typeof raw === "string" ? raw : new TextDecoder("utf-8").decode(raw);
  const screen = new TerminalScreen(size);
  screen.write(text);
  return screen.toText();
}
