/**
 * Rounds half away from zero at `places` decimals. The scaled value is first
 * cleaned to 12 significant digits so that binary noise (`20.799999999`)
 * does not move a tie.
 */
export function roundTo(value: number, places: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  const factor = 10 ** places;
  const scaled = Number((Math.abs(value) * factor).toPrecision(12));
  const rounded = (Math.sign(value) * Math.round(scaled)) / factor;
  return rounded === 0 ? 0 : rounded;
}

export function roundToTenth(value: number): number {
  return roundTo(value, 1);
}

/** Number coercion for provider stat cells: anything that is not a finite number reads as zero. */
export function toStatNumber(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }

  if (typeof value === "string") {
    const clean = value.replace(/,/g, "").trim();
    if (!/^[-+]?(\d+\.?\d*|\.\d+)$/.test(clean)) {
      return 0;
    }

    const parsed = Number.parseFloat(clean);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  return 0;
}
