import type { OutputPort } from './output.js';

export type RecordedKind = 'info' | 'step' | 'message' | 'success' | 'error' | 'warn' | 'confirm';

export interface RecordedLine {
  kind: RecordedKind;
  text: string;
}

export interface RecordingOutput extends OutputPort {
  readonly lines: RecordedLine[];
  /** Texts of all lines of `kind`, in order. */
  texts(kind?: RecordedKind): string[];
}

/**
 * An {@link OutputPort} that keeps everything in memory. `confirm` answers
 * with `answer` and records the question.
 */
export function createRecordingOutput(answer: boolean = true): RecordingOutput {
  const lines: RecordedLine[] = [];
  const record = (kind: RecordedKind) => (text: string): void => {
    lines.push({ kind, text });
  };

  return {
    lines,
    texts(kind?: RecordedKind): string[] {
      return lines.filter(line => kind === undefined || line.kind === kind).map(line => line.text);
    },
    info: record('info'),
    step: record('step'),
    message: record('message'),
    success: record('success'),
    error: record('error'),
    warn: record('warn'),
    async confirm(message: string): Promise<boolean> {
      lines.push({ kind: 'confirm', text: message });
      return answer;
    },
  };
}
