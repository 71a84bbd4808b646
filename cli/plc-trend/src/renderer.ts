import type { Device, Figure, FigureLine, FigurePanel } from "./schema.js";
import type { SeriesView } from "./series-store.js";
import { nowMs } from "./util.js";

export const PALETTE = ["red", "green", "purple", "orange", "pink"] as const;

export interface Renderer {
  readonly name: string;
  render(view: SeriesView): void | Promise<void>;
  close?(): void | Promise<void>;
}

export function assignColors(devices: readonly Pick<Device, "name">[], palette: readonly string[] = PALETTE): Map<string, string> {
  const colors = new Map<string, string>();
  devices.forEach((device, idx) => colors.set(device.name, palette[idx % palette.length]));
  return colors;
}

export function buildPanel(view: SeriesView, tag: string, stamps: number[], colors: Map<string, string>): FigurePanel {
  const lines: FigureLine[] = [];
  let idx = 0;
  for (const [device, samples] of view.snapshotFor(tag)) {
    const color = colors.get(device) ?? PALETTE[(colors.size + idx) % PALETTE.length];
    idx += 1;
    const n = Math.min(samples.length, stamps.length);
    if (n === 0) continue;
    const ys = samples.slice(samples.length - n);
    const xs = stamps.slice(stamps.length - n);
    lines.push({
      device,
      color,
      points: ys.map((s, i) => ({ t: xs[i], v: s.value })),
    });
  }
  return { tag, lines };
}

export function buildFigure(view: SeriesView, colors: Map<string, string>, title: string, now = nowMs()): Figure {
  const stamps = view.timestamps();
  return {
    title,
    t: now,
    window: {
      start: stamps.length ? stamps[0] : null,
      end: stamps.length ? stamps[stamps.length - 1] : null,
      length: stamps.length,
    },
    panels: view.tagLabels().map((tag) => buildPanel(view, tag, stamps, colors)),
  };
}
