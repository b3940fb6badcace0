export function formatDurationMs(totalMs: number): string {
    if (!Number.isFinite(totalMs) || totalMs < 0) return '0ms';
    if (totalMs < 1000) return `${Math.floor(totalMs)}ms`;
    const totalSeconds = Math.floor(totalMs / 1000);
    const s = totalSeconds % 60;
    const totalMinutes = Math.floor(totalSeconds / 60);
    const m = totalMinutes % 60;
    const h = Math.floor(totalMinutes / 60);
    const parts: string[] = [];
    if (h) parts.push(`${h}h`);
    if (m) parts.push(`${m}m`);
    if (s || parts.length === 0) parts.push(`${s}s`);
    return parts.join(' ');
}

export function isoFromSeconds(seconds: number): string {
    if (!Number.isFinite(seconds)) return '';
    return new Date(seconds * 1000).toISOString();
}

// 15 -> '15m', 60 -> '1h', 1440 -> '1d'
export function intervalLabel(minutes: number): string {
    if (minutes % 1440 === 0) return `${minutes / 1440}d`;
    if (minutes % 60 === 0) return `${minutes / 60}h`;
    return `${minutes}m`;
}

export function fixed(value: number, digits = 4): string {
    return Number.isFinite(value) ? value.toFixed(digits) : String(value);
}
