export function nowUtcIsoSeconds(now: Date = new Date()): string {
  const iso = now.toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local-time stamp used in run directory names, e.g. `2410191432`. */
export function runDirStamp(now: Date): string {
  return [
    pad2(now.getFullYear() % 100),
    pad2(now.getMonth() + 1),
    pad2(now.getDate()),
    pad2(now.getHours()),
    pad2(now.getMinutes())
  ].join("");
}

/** Local-time stamp used in artifact and record file names, e.g. `20241019_143205`. */
export function fileStamp(now: Date): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `${date}_${time}`;
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}
