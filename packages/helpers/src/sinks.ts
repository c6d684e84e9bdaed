/** Receives rendered, human-facing lines. */
export type LineSink = (line: string) => void;

export const consoleSink: LineSink = (line) => {
  console.info(line);
};

/**
 * Sink that keeps every line it receives, in order.
 */
export function collectLines(): { sink: LineSink; lines: string[] } {
  const lines: string[] = [];
  return {
    sink: (line) => {
      lines.push(line);
    },
    lines,
  };
}
