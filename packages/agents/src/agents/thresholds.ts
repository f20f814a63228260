import type { HealthReading, Severity } from '@carewatch/shared';

export type VitalMetric =
    | 'heart_rate'
    | 'blood_pressure_systolic'
    | 'blood_pressure_diastolic'
    | 'glucose_level'
    | 'oxygen_saturation';

export interface VitalRange {
    label: string;
    unit: string;
    low?: number;
    high?: number;
    criticalLow?: number;
    criticalHigh?: number;
    criticalHighInclusive?: boolean;
}

export interface VitalDeviation {
    metric: VitalMetric;
    label: string;
    value: number;
    unit: string;
    direction: 'low' | 'high';
    severity: Exclude<Severity, 'info'>;
}

// low/high are inclusive bounds of the normal range; criticalHigh is exceeded unless marked inclusive
export const VITAL_THRESHOLDS: Record<VitalMetric, VitalRange> = {
    heart_rate: { label: 'Heart rate', unit: 'bpm', low: 60, high: 100, criticalLow: 40, criticalHigh: 130 },
    blood_pressure_systolic: { label: 'Systolic blood pressure', unit: 'mmHg', low: 90, high: 140, criticalHigh: 180, criticalHighInclusive: true },
    blood_pressure_diastolic: { label: 'Diastolic blood pressure', unit: 'mmHg', low: 60, high: 90, criticalHigh: 120, criticalHighInclusive: true },
    glucose_level: { label: 'Glucose', unit: 'mg/dL', low: 70, high: 140, criticalLow: 54, criticalHigh: 300 },
    oxygen_saturation: { label: 'Oxygen saturation', unit: '%', low: 90, criticalLow: 88 },
};

export const VITAL_METRICS: VitalMetric[] = [
    'heart_rate',
    'blood_pressure_systolic',
    'blood_pressure_diastolic',
    'glucose_level',
    'oxygen_saturation',
];

// Imported rows store 0 for a value the device did not report
export function evaluateVital(metric: VitalMetric, value: number | null): VitalDeviation | null {
    if (value === null || value <= 0) return null;

    const range = VITAL_THRESHOLDS[metric];
    const base = { metric, label: range.label, value, unit: range.unit };

    if (range.low !== undefined && value < range.low) {
        const critical = range.criticalLow !== undefined && value < range.criticalLow;
        return { ...base, direction: 'low', severity: critical ? 'critical' : 'warning' };
    }

    if (range.high !== undefined && value > range.high) {
        const critical = range.criticalHigh !== undefined &&
            (range.criticalHighInclusive ? value >= range.criticalHigh : value > range.criticalHigh);
        return { ...base, direction: 'high', severity: critical ? 'critical' : 'warning' };
    }

    return null;
}

export function evaluateReading(reading: HealthReading): VitalDeviation[] {
    const values: Record<VitalMetric, number | null> = {
        heart_rate: reading.heartRate,
        blood_pressure_systolic: reading.bloodPressureSystolic,
        blood_pressure_diastolic: reading.bloodPressureDiastolic,
        glucose_level: reading.glucoseLevel,
        oxygen_saturation: reading.oxygenSaturation,
    };

    const deviations: VitalDeviation[] = [];
    for (const metric of VITAL_METRICS) {
        const deviation = evaluateVital(metric, values[metric]);
        if (deviation) deviations.push(deviation);
    }
    return deviations;
}
