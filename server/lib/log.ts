const timestamp = (): string =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

export function log(message: string, source = "express"): void {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logWarn(message: string, source = "express", detail?: unknown): void {
  if (detail === undefined) {
    console.warn(`${timestamp()} [${source}] ${message}`);
  } else {
    console.warn(`${timestamp()} [${source}] ${message}`, detail);
  }
}

export function logError(message: string, source = "express", detail?: unknown): void {
  if (detail === undefined) {
    console.error(`${timestamp()} [${source}] ${message}`);
  } else {
    console.error(`${timestamp()} [${source}] ${message}`, detail);
  }
}
