import type { VersionToken } from "@autoversion/core-domain";

const TOKEN_PATTERN = /^(\d{8}T\d{9}Z)(?:-(\d+))?$/;

export type VersionSlot = {
  token: VersionToken;
  suffix: number;
};

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** `YYYYMMDDTHHmmssSSSZ` in UTC: fixed width, so lexical order is creation order. */
export function formatVersionToken(epochMs: number): VersionToken {
  const d = new Date(epochMs);
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `T${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}` +
    `${pad(d.getUTCMilliseconds(), 3)}Z`
  );
}

export function versionFileName(baseName: string, slot: VersionSlot): string {
  const name = `${baseName}.${slot.token}`;
  return slot.suffix > 0 ? `${name}-${slot.suffix}` : name;
}

export function parseVersionFileName(baseName: string, fileName: string): VersionSlot | null {
  const prefix = `${baseName}.`;
  if (!fileName.startsWith(prefix)) return null;

  const match = TOKEN_PATTERN.exec(fileName.slice(prefix.length));
  if (!match) return null;

  return { token: match[1], suffix: match[2] ? Number(match[2]) : 0 };
}

export function compareVersionSlots(a: VersionSlot, b: VersionSlot): number {
  if (a.token !== b.token) return a.token < b.token ? -1 : 1;
  return a.suffix - b.suffix;
}

/**
 * Slot for a new version given the clock and the last slot issued for the same
 * file. A clock that did not move forward reuses the last token with the next
 * suffix, so slots only ever increase.
 */
export function nextVersionSlot(epochMs: number, last: VersionSlot | null): VersionSlot {
  const token = formatVersionToken(epochMs);
  if (last && token <= last.token) {
    return { token: last.token, suffix: last.suffix + 1 };
  }
  return { token, suffix: 0 };
}
