const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/** Local wall-clock time, second precision: `2024-05-01 09:03:07`. */
export const formatLocalTimestamp = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/** Filename-safe local stamp: `20240501_090307`. */
export const formatFileStamp = (date: Date) =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const toUnixSeconds = (ms: number) => Math.floor(ms / 1000);

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
