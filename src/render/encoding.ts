// Characters in 0x80-0x9F of Windows-1252 that the standard PDF fonts can draw
const WIN_ANSI_EXTRAS = new Set("€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ");

function isWinAnsi(ch: string): boolean {
  const cp = ch.codePointAt(0) ?? 0;
  return (cp >= 0x20 && cp <= 0x7e) || (cp >= 0xa0 && cp <= 0xff) || WIN_ANSI_EXTRAS.has(ch);
}

/**
 * Map text onto the WinAnsi repertoire of the built-in PDF fonts. Accented
 * letters lose their marks, anything else outside the set becomes "?".
 * Control and format characters are dropped; tabs become spaces.
 */
export function toWinAnsi(text: string): string {
  let out = "";
  for (const ch of text) {
    if (ch === "\t") {
      out += " ";
    } else if (isWinAnsi(ch)) {
      out += ch;
    } else if (/[\p{Cc}\p{Cf}]/u.test(ch)) {
      continue;
    } else {
      const base = ch.normalize("NFKD").replace(/\p{M}/gu, "");
      out += base && [...base].every(isWinAnsi) ? base : "?";
    }
  }
  return out;
}
