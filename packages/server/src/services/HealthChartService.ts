import { format } from 'date-fns';
import { CHART_LABEL_FORMAT, type HealthReading } from '@carewatch/shared';

export interface ChartSeries {
    labels: string[];
    values: number[];
}

export interface BloodPressureSeries {
    labels: string[];
    systolic: number[];
    diastolic: number[];
}

export interface HealthChartData {
    heart_rate: ChartSeries;
    blood_pressure: BloodPressureSeries;
    glucose_level: ChartSeries;
    oxygen_saturation: ChartSeries;
}

function appendPoint(series: ChartSeries, label: string, value: number | null): void {
    if (value === null) return;
    series.labels.push(label);
    series.values.push(value);
}

/**
 * Builds chart series from readings ordered newest first, as the health page loads them.
 * Each series only carries the points that have a value, except blood pressure, which
 * plots a missing side as 0 so both lines share one set of labels.
 */
export function prepareHealthChartData(readingsNewestFirst: HealthReading[]): HealthChartData {
    const chartData: HealthChartData = {
        heart_rate: { labels: [], values: [] },
        blood_pressure: { labels: [], systolic: [], diastolic: [] },
        glucose_level: { labels: [], values: [] },
        oxygen_saturation: { labels: [], values: [] }
    };

    for (const reading of [...readingsNewestFirst].reverse()) {
        const label = format(reading.timestamp, CHART_LABEL_FORMAT);

        appendPoint(chartData.heart_rate, label, reading.heartRate);

        chartData.blood_pressure.labels.push(label);
        chartData.blood_pressure.systolic.push(reading.bloodPressureSystolic ?? 0);
        chartData.blood_pressure.diastolic.push(reading.bloodPressureDiastolic ?? 0);

        appendPoint(chartData.glucose_level, label, reading.glucoseLevel);
        appendPoint(chartData.oxygen_saturation, label, reading.oxygenSaturation);
    }

    return chartData;
}
