export type LogSink = (line: string) => void;

export type LogFields = Record<string, string | number | boolean | undefined>;

export const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function toOneLine(value: string, maxLen = 220): string {
  const compact = value.replace(/\s+/g, " ").trim();
  if (compact.length <= maxLen) {
    return compact;
  }
  return `${compact.slice(0, maxLen)}...`;
}

/**
 * `[tag] key=value ...` 형식의 한 줄 로그를 만든다.
 * 값이 undefined 인 필드는 생략한다.
 */
export function formatLogLine(tag: string, fields: LogFields): string {
  const parts = [`[${tag}]`];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    parts.push(`${key}=${value}`);
  }
  return parts.join(" ");
}

export function logLine(sink: LogSink, tag: string, fields: LogFields): void {
  sink(formatLogLine(tag, fields));
}
