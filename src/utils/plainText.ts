/**
 * Strip the markdown a model tends to add so a reply can be read aloud.
 *
 * Examples:
 * - "**Saved!** Location: _Radiologia_" → "Saved! Location: Radiologia"
 * - "- name\n- floor" → "name\nfloor"
 * - "mario_rossi@example.it" is left alone
 */
export function toSpeechText(markdown: string): string {
  return markdown
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/`([^`]*)`/g, '$1')
    .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
    .replace(/^\s{0,3}#{1,6}\s+/gm, '')
    .replace(/^\s*(?:[-*+•]|\d+[.)])\s+/gm, '')
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/\*(\S[^*]*?)\*/g, '$1')
    // Underscores only delimit emphasis at word edges; "AB_12_C" stays as is
    .replace(/(?<!\w)__(\S.*?)__(?!\w)/g, '$1')
    .replace(/(?<!\w)_(\S[^_]*?)_(?!\w)/g, '$1')
    .replace(/[*#`]/g, '')
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .trim();
}
