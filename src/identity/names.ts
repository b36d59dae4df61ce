const ROLE_PARENTHETICAL = /\s*\((?:batter|pitcher)\)/gi;
const ESCAPED_BYTE_RUN = /(?:\\x[0-9a-f]{2})+/gi;
const SINGLE_BYTE_ONLY = /^[\u0000-\u00ff]*$/;
const HIGH_BYTE = /[\u0080-\u00ff]/;
const COMBINING_MARK = /\p{M}/gu;

/**
 * Canonical comparison key for a player display name from either provider.
 *
 * Role parentheticals are dropped, encoding damage from either provider is
 * repaired where the bytes decode cleanly, and case, diacritics and
 * whitespace differences are folded away. Never throws; the result is only
 * meant for comparison.
 */
export function normalizePlayerName(rawName: string | null | undefined): string {
  if (!rawName) {
    return "";
  }

  // Folding can expose another role tag, escape run or mojibake sequence, so
  // passes repeat until the key stops changing. Each effective repair shortens it.
  let current = rawName;
  for (let pass = 0; pass <= rawName.length; pass += 1) {
    const next = normalizeOnce(current);
    if (next === current) {
      break;
    }
    current = next;
  }

  return current;
}

function normalizeOnce(value: string): string {
  const withoutRole = value.replace(ROLE_PARENTHETICAL, "");
  const repaired = repairMojibake(repairEscapedBytes(withoutRole));

  return repaired
    .toLowerCase()
    .normalize("NFD")
    .replace(COMBINING_MARK, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** Decodes runs of literal `\xHH` escapes left behind by a double-encoding bug. */
export function repairEscapedBytes(value: string): string {
  return value.replace(ESCAPED_BYTE_RUN, (run) => {
    const bytes = run
      .split(/\\x/i)
      .filter((hex) => hex.length > 0)
      .map((hex) => Number.parseInt(hex, 16));

    return decodeUtf8(Uint8Array.from(bytes)) ?? run;
  });
}

/** Re-reads text whose UTF-8 bytes were decoded as Latin-1 (`JosÃ©` → `José`). */
export function repairMojibake(value: string): string {
  if (!HIGH_BYTE.test(value) || !SINGLE_BYTE_ONLY.test(value)) {
    return value;
  }

  return decodeUtf8(Buffer.from(value, "latin1")) ?? value;
}

function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}
