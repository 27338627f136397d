/**
 * Output file naming: `{tag}_{slug(hint)}_{YYYYMMDD_HHMMSS}.{ext}`.
 *
 * Names have second resolution. Two calls in the same second with the same
 * tag and hint produce the same name and the later write replaces the earlier
 * one.
 */

export const HINT_MAX_LENGTH = 5;

export interface OutputNameOptions {
  /** Use the hint verbatim (generated ids), skipping slug truncation. */
  fullId?: boolean;
  now?: Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local-time `YYYYMMDD_HHMMSS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function slugifyHint(hint: string, maxLength: number = HINT_MAX_LENGTH): string {
  const cleaned = hint
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .replace(/[/\\<>:"|?*]/g, "")
    .replace(/\s+/g, " ")
    .trim();
  return Array.from(cleaned).slice(0, maxLength).join("").replace(/ /g, "_");
}

export function makeOutputFileName(tag: string, hint: string, ext: string, options: OutputNameOptions = {}): string {
  const id = options.fullId ? hint : slugifyHint(hint);
  const extension = ext.replace(/^\.+/, "");
  return `${tag}_${id}_${formatTimestamp(options.now ?? new Date())}.${extension}`;
}
