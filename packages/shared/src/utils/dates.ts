import { format } from 'date-fns';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
export const CHART_LABEL_FORMAT = 'yyyy-MM-dd HH:mm';

export function formatTimestamp(date: Date): string {
    return format(date, TIMESTAMP_FORMAT);
}

export function formatOptionalTimestamp(date: Date | null): string | null {
    return date ? formatTimestamp(date) : null;
}
