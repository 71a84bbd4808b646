import { buildFigure, type Renderer } from "./renderer.js";
import type { Figure, FigureLine } from "./schema.js";
import type { SeriesView } from "./series-store.js";
import { isoFromMs } from "./util.js";

const ANSI: Record<string, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  purple: "\x1b[35m",
  orange: "\x1b[33m",
  pink: "\x1b[95m",
};
const RESET = "\x1b[0m";
const CLEAR = "\x1b[2J\x1b[H";
const SPARKS = "▁▂▃▄▅▆▇█";

export type TerminalOptions = {
  width: number;
  color: boolean;
  clear: boolean;
};

export type Writable = { write(chunk: string): unknown };

export function formatValue(value: number | null): string {
  if (value === null) return "n/a";
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function sparkline(values: Array<number | null>, width: number): string {
  const tail = values.slice(-width);
  const present = tail.filter((v): v is number => v !== null);
  if (present.length === 0) return " ".repeat(tail.length);
  const min = Math.min(...present);
  const max = Math.max(...present);
  return tail
    .map((v) => {
      if (v === null) return " ";
      if (max === min) return SPARKS[3];
      return SPARKS[Math.round(((v - min) / (max - min)) * (SPARKS.length - 1))];
    })
    .join("");
}

function formatLine(line: FigureLine, nameWidth: number, opts: TerminalOptions): string {
  const values = line.points.map((p) => p.v);
  const present = values.filter((v): v is number => v !== null);
  const latest = values.length ? values[values.length - 1] : null;
  const min = present.length ? Math.min(...present) : null;
  const max = present.length ? Math.max(...present) : null;
  const name = line.device.padEnd(nameWidth);
  const label = opts.color && ANSI[line.color] ? `${ANSI[line.color]}${name}${RESET}` : name;
  return `  ${label}  ${formatValue(latest).padStart(10)}  min ${formatValue(min)} max ${formatValue(max)}  ${sparkline(values, opts.width)}`;
}

export function formatFigure(figure: Figure, opts: TerminalOptions): string {
  const out: string[] = [];
  const clock = figure.window.end !== null ? isoFromMs(figure.window.end).slice(11, 19) : "--:--:--";
  out.push(`${figure.title}  ${clock}  samples ${figure.window.length}`);
  for (const panel of figure.panels) {
    out.push(`-- ${panel.tag} ${"-".repeat(Math.max(0, 40 - panel.tag.length))}`);
    if (panel.lines.length === 0) {
      out.push("  (no samples yet)");
      continue;
    }
    const nameWidth = Math.max(...panel.lines.map((l) => l.device.length));
    for (const line of panel.lines) out.push(formatLine(line, nameWidth, opts));
  }
  return `${opts.clear ? CLEAR : ""}${out.join("\n")}\n`;
}

export class TerminalRenderer implements Renderer {
  readonly name = "terminal";
  private opts: TerminalOptions;

  constructor(
    private colors: Map<string, string>,
    private title: string,
    private out: Writable = process.stdout,
    opts: Partial<TerminalOptions> = {},
  ) {
    this.opts = { width: 40, color: true, clear: true, ...opts };
  }

  render(view: SeriesView) {
    this.out.write(formatFigure(buildFigure(view, this.colors, this.title), this.opts));
  }
}
