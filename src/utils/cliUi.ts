const RESET = "\u001b[0m";

export const colorModes = ["auto", "always", "never"] as const;

export type ColorMode = (typeof colorModes)[number];

/** Where rendered text goes. The CLI binds these to process.stdout/stderr. */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

let colorMode: ColorMode = "auto";

function detectAutoColor(): boolean {
  if (process.env.NO_COLOR && ["1", "true"].includes(process.env.NO_COLOR.toLowerCase())) {
    return false;
  }
  if (process.env.FORCE_COLOR && process.env.FORCE_COLOR !== "0") {
    return true;
  }
  return Boolean(process.stdout?.isTTY);
}

function colorEnabled(): boolean {
  if (colorMode === "always") {
    return true;
  }
  if (colorMode === "never") {
    return false;
  }
  return detectAutoColor();
}

function apply(code: string, text: string): string {
  if (!colorEnabled()) {
    return text;
  }
  return `\u001b[${code}m${text}${RESET}`;
}

export function setColorMode(mode: ColorMode): void {
  colorMode = mode;
}

export const colors = {
  bold: (text: string) => apply("1", text),
  red: (text: string) => apply("31", text),
  green: (text: string) => apply("32", text),
  yellow: (text: string) => apply("33", text),
  blue: (text: string) => apply("34", text),
  cyan: (text: string) => apply("36", text),
  gray: (text: string) => apply("90", text),
};

export function formatId(id: string | number): string {
  return colors.cyan(String(id));
}

export function formatState(state: string): string {
  switch (state) {
    case "accepted":
      return colors.green(state);
    case "delivered":
    case "finished":
      return colors.cyan(state);
    case "rejected":
      return colors.red(state);
    case "started":
      return colors.blue(state);
    default:
      return colors.yellow(state);
  }
}

export interface TableCell {
  text: string;
  align?: "left" | "right";
  color?: (text: string) => string;
}

const COLUMN_GAP = "  ";
const MIN_COLUMN_WIDTH = 4;

function alignCell(cell: TableCell, width: number, isLast: boolean): string {
  if (cell.align === "right") {
    return cell.text.padStart(width);
  }
  return isLast ? cell.text : cell.text.padEnd(width);
}

/** Header, dashed rule, then one line per row; a left-aligned last column is not padded. */
export function renderTable(headers: TableCell[], rows: TableCell[][]): string {
  const widths = headers.map((header, index) =>
    Math.max(MIN_COLUMN_WIDTH, header.text.length, ...rows.map((row) => row[index]?.text.length ?? 0)),
  );
  const lastIndex = headers.length - 1;
  const renderRow = (cells: TableCell[], fallback: (text: string) => string): string =>
    cells
      .map((cell, index) => (cell.color ?? fallback)(alignCell(cell, widths[index] ?? 0, index === lastIndex)))
      .join(COLUMN_GAP);

  const lines = [
    renderRow(headers, colors.bold),
    widths.map((width) => "-".repeat(width)).join(COLUMN_GAP),
    ...rows.map((row) => renderRow(row, (text) => text)),
  ];
  return `${lines.join("\n")}\n`;
}

export function formatHeading(text: string): string {
  return colors.bold(text);
}

export function formatWarning(message: string): string {
  return `${colors.yellow("warn")} ${message}\n`;
}

export function formatDebug(message: string): string {
  return `${colors.gray("debug")} ${message}\n`;
}

export function sortEntries<T>(entries: [string, T][]): [string, T][] {
  return entries.sort((a, b) => a[0].localeCompare(b[0]));
}
