export type LogLevel = "info" | "warn" | "error";

export interface LogEvent {
  stage: string;
  level?: LogLevel;
  [key: string]: unknown;
}

export function log(event: LogEvent) {
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level: "info",
    ...event
  });
  if (event.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}
