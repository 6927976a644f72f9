/**
 * Strip ANSI/VT100 escape sequences and carriage returns from shell output.
 * Apply to a complete read result, never to single chunks, or a sequence
 * split across chunks survives.
 */
export function stripAnsi(text: string): string {
  return text
    // CSI sequences: ESC [ (params) (intermediates) (final byte)
    .replace(/\x1b\[[\x20-\x3f]*[\x40-\x7e]/g, '')
    // OSC sequences: ESC ] ... (BEL or ST)
    .replace(/\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g, '')
    // Other 2-char ESC sequences
    .replace(/\x1b[^[\]]/g, '')
    // Control characters except newline and tab
    .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g, '')
    .replace(/\r/g, '')
}

/**
 * Drops the first line of `output` when it echoes `command`. Output whose
 * first line does not contain the command verbatim is returned unchanged.
 */
export function stripCommandEcho(output: string, command: string): string {
  const lines = output.split('\n')
  if (lines[0].includes(command)) {
    return lines.slice(1).join('\n')
  }
  return output
}
