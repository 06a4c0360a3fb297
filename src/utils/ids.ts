// Time-derived record keys: YYYYMMDD_HHMMSS_ffffff (local time, microseconds).
// Keys sort lexicographically in creation order and never repeat within a process.

let lastIssuedMicros = 0;

function pad(value: number, width: number): string {
    return value.toString().padStart(width, '0');
}

/**
 * Current wall-clock time in microseconds, bumped past the previous value
 * when two calls land on the same microsecond.
 */
function nextMicros(now: () => number): number {
    const wallMs = now();
    const subMs = Number(process.hrtime.bigint() % 1000n);
    let micros = wallMs * 1000 + subMs;

    if (micros <= lastIssuedMicros) {
        micros = lastIssuedMicros + 1;
    }
    lastIssuedMicros = micros;
    return micros;
}

export function formatTimestampKey(micros: number): string {
    const date = new Date(Math.floor(micros / 1000));
    const fraction = micros % 1_000_000;

    const day = `${date.getFullYear()}${pad(date.getMonth() + 1, 2)}${pad(date.getDate(), 2)}`;
    const time = `${pad(date.getHours(), 2)}${pad(date.getMinutes(), 2)}${pad(date.getSeconds(), 2)}`;

    return `${day}_${time}_${pad(fraction, 6)}`;
}

export function generateTimestampKey(now: () => number = Date.now): string {
    return formatTimestampKey(nextMicros(now));
}

export function generateUnknownFaceId(): string {
    return `unknown_${generateTimestampKey()}`;
}

export function generateRecognitionId(): string {
    return `recognition_${generateTimestampKey()}`;
}
