import sharp from "sharp";
import type { ImageRenderer, Logger, WidgetBindings } from "./types.js";

export const WIDGET_WIDTH = 600;
export const WIDGET_HEIGHT = 420;

const FONT = "DejaVu Sans, Arial, Helvetica, sans-serif";

/** Escape a string for safe interpolation into SVG/XML. */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function text(
  x: number,
  y: number,
  content: string,
  size: number,
  options: { weight?: "normal" | "bold"; fill?: string; anchor?: "start" | "middle" | "end" } = {}
): string {
  const weight = options.weight ?? "normal";
  const fill = options.fill ?? "#ffffff";
  const anchor = options.anchor ?? "start";
  return `<text x="${x}" y="${y}" font-family="${FONT}" font-size="${size}" font-weight="${weight}" fill="${fill}" text-anchor="${anchor}">${escapeXml(content)}</text>`;
}

export function renderWidgetSvg(bindings: WidgetBindings): string {
  const details = [
    `Feels like ${bindings.feelsLike}°C`,
    `Humidity ${bindings.humidity}%`,
    `Wind ${bindings.windKmh} km/h ${bindings.windDirection}`,
    `Rain ${bindings.rainLabel}`,
  ];
  if (bindings.sunriseLabel && bindings.sunsetLabel) {
    details.push(`Sun ${bindings.sunriseLabel} – ${bindings.sunsetLabel}`);
  }

  const slotWidth = WIDGET_WIDTH / Math.max(bindings.slots.length, 1);
  const slots = bindings.slots.map((slot, index) => {
    const cx = Math.round(slotWidth * index + slotWidth / 2);
    return [
      text(cx, 262, slot.timeLabel, 14, { anchor: "middle", fill: "#cfe3ff" }),
      text(cx, 292, slot.icon, 22, { anchor: "middle" }),
      text(cx, 318, `${slot.temperature}°`, 16, { anchor: "middle", weight: "bold" }),
      text(cx, 336, `${slot.precipProbabilityPct}%`, 12, { anchor: "middle", fill: "#9cc4ff" }),
    ].join("");
  });

  const dayWidth = WIDGET_WIDTH / Math.max(bindings.days.length, 1);
  const days = bindings.days.map((day, index) => {
    const cx = Math.round(dayWidth * index + dayWidth / 2);
    return [
      text(cx, 374, `${day.dayLabel} ${day.icon}`, 14, { anchor: "middle" }),
      text(cx, 398, `${day.high}° / ${day.low}°`, 14, { anchor: "middle", fill: "#cfe3ff" }),
    ].join("");
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDGET_WIDTH}" height="${WIDGET_HEIGHT}" viewBox="0 0 ${WIDGET_WIDTH} ${WIDGET_HEIGHT}">`,
    `<defs><linearGradient id="sky" x1="0" y1="0" x2="0" y2="1"><stop offset="0" stop-color="#1e3c72"/><stop offset="1" stop-color="#2a5298"/></linearGradient></defs>`,
    `<rect width="${WIDGET_WIDTH}" height="${WIDGET_HEIGHT}" rx="16" fill="url(#sky)"/>`,
    text(24, 40, bindings.city, 26, { weight: "bold" }),
    text(24, 64, bindings.observedAtLabel, 14, { fill: "#cfe3ff" }),
    text(24, 150, `${bindings.icon} ${bindings.temperature}°C`, 56, { weight: "bold" }),
    text(24, 184, bindings.description, 20),
    ...details.map((line, index) => text(WIDGET_WIDTH - 24, 96 + index * 24, line, 15, { anchor: "end" })),
    `<line x1="24" y1="232" x2="${WIDGET_WIDTH - 24}" y2="232" stroke="#ffffff" stroke-opacity="0.3"/>`,
    ...slots,
    `<line x1="24" y1="352" x2="${WIDGET_WIDTH - 24}" y2="352" stroke="#ffffff" stroke-opacity="0.3"/>`,
    ...days,
    "</svg>",
  ].join("");
}

/** Rasterises the widget SVG to PNG with sharp. Returns null on failure. */
export class SharpRenderer implements ImageRenderer {
  constructor(private readonly logger: Logger = console) {}

  async render(bindings: WidgetBindings): Promise<Buffer | null> {
    try {
      const svg = renderWidgetSvg(bindings);
      const png = await sharp(Buffer.from(svg)).png().toBuffer();
      this.logger.log(`Rendered weather widget (${png.length} bytes)`);
      return png;
    } catch (error) {
      this.logger.error("Failed to render weather widget", error);
      return null;
    }
  }
}
