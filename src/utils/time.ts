const pad = (n: number) => String(n).padStart(2, '0');

// YYYY-MM-DD HH:mm:ss, local time
export function formatTimestamp(date: Date = new Date()): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

// YYYYMMDD_HHmmss, local time, for file names
export function fileStamp(date: Date = new Date()): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_`
        + `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
