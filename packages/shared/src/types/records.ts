export type Severity = 'info' | 'warning' | 'critical';

export type EventSeverity = Severity | 'error';

export interface EventView {
    id: number;
    timestamp: string;
    source: string;
    event_type: string;
    description: string | null;
    severity: string;
}

export interface HealthReadingView {
    id: number;
    timestamp: string;
    device_id: string;
    heart_rate: number | null;
    heart_rate_alert: boolean;
    blood_pressure_systolic: number | null;
    blood_pressure_diastolic: number | null;
    blood_pressure_alert: boolean;
    glucose_level: number | null;
    glucose_level_alert: boolean;
    oxygen_saturation: number | null;
    oxygen_saturation_alert: boolean;
    alert_triggered: boolean;
    caregiver_notified: boolean;
}

export interface SafetyAlertView {
    id: number;
    timestamp: string;
    device_id: string;
    movement_activity: string | null;
    fall_detected: boolean;
    impact_force_level: string | null;
    post_fall_inactivity: number | null;
    location: string | null;
    alert_triggered: boolean;
    caregiver_notified: boolean;
    severity: string | null;
    resolved: boolean;
    resolved_timestamp: string | null;
}

export interface ReminderView {
    id: number;
    timestamp: string;
    device_id: string;
    reminder_type: string;
    description: string | null;
    scheduled_time: string;
    recurrence: string | null;
    priority: string;
    completed: boolean;
    completed_timestamp: string | null;
    reminder_sent: boolean;
    acknowledged: boolean;
}
