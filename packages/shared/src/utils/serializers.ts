import type { EventRecord, HealthReading, Reminder, SafetyAlert } from '../db/schema.js';
import type { EventView, HealthReadingView, ReminderView, SafetyAlertView } from '../types/records.js';
import { formatOptionalTimestamp, formatTimestamp } from './dates.js';

export function toEventView(event: EventRecord): EventView {
    return {
        id: event.id,
        timestamp: formatTimestamp(event.timestamp),
        source: event.source,
        event_type: event.eventType,
        description: event.description,
        severity: event.severity
    };
}

export function toHealthReadingView(reading: HealthReading): HealthReadingView {
    return {
        id: reading.id,
        timestamp: formatTimestamp(reading.timestamp),
        device_id: reading.patientId,
        heart_rate: reading.heartRate,
        heart_rate_alert: reading.heartRateAlert,
        blood_pressure_systolic: reading.bloodPressureSystolic,
        blood_pressure_diastolic: reading.bloodPressureDiastolic,
        blood_pressure_alert: reading.bloodPressureAlert,
        glucose_level: reading.glucoseLevel,
        glucose_level_alert: reading.glucoseLevelAlert,
        oxygen_saturation: reading.oxygenSaturation,
        oxygen_saturation_alert: reading.oxygenSaturationAlert,
        alert_triggered: reading.alertTriggered,
        caregiver_notified: reading.caregiverNotified
    };
}

export function toSafetyAlertView(alert: SafetyAlert): SafetyAlertView {
    return {
        id: alert.id,
        timestamp: formatTimestamp(alert.timestamp),
        device_id: alert.patientId,
        movement_activity: alert.movementActivity,
        fall_detected: alert.fallDetected,
        impact_force_level: alert.impactForceLevel,
        post_fall_inactivity: alert.postFallInactivity,
        location: alert.location,
        alert_triggered: alert.alertTriggered,
        caregiver_notified: alert.caregiverNotified,
        severity: alert.severity,
        resolved: alert.resolved,
        resolved_timestamp: formatOptionalTimestamp(alert.resolvedTimestamp)
    };
}

export function toReminderView(reminder: Reminder): ReminderView {
    return {
        id: reminder.id,
        timestamp: formatTimestamp(reminder.timestamp),
        device_id: reminder.patientId,
        reminder_type: reminder.reminderType,
        description: reminder.description,
        scheduled_time: formatTimestamp(reminder.scheduledTime),
        recurrence: reminder.recurrence,
        priority: reminder.priority,
        completed: reminder.completed,
        completed_timestamp: formatOptionalTimestamp(reminder.completedTimestamp),
        reminder_sent: reminder.reminderSent,
        acknowledged: reminder.acknowledged
    };
}
