import { sqliteTable, integer, text } from 'drizzle-orm/sqlite-core';

const createdAt = (name: string) =>
    integer(name, { mode: 'timestamp_ms' }).notNull().$defaultFn(() => new Date());

const flag = (name: string) =>
    integer(name, { mode: 'boolean' }).notNull().default(false);

export const patients = sqliteTable('patients', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    patientId: text('patient_id').notNull().unique(),
    name: text('name').notNull(),
    age: integer('age'),
    gender: text('gender'),
    address: text('address'),
    phone: text('phone'),
    emergencyContact: text('emergency_contact'),
    medicalConditions: text('medical_conditions'),
    registeredDate: createdAt('registered_date'),
});

// `patients` holds a comma-separated list of monitored patient or device IDs
export const caregivers = sqliteTable('caregivers', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    caregiverId: text('caregiver_id').notNull().unique(),
    name: text('name').notNull(),
    role: text('role').notNull(),
    phone: text('phone'),
    email: text('email'),
    patients: text('patients'),
    registeredDate: createdAt('registered_date'),
});

export const events = sqliteTable('events', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: createdAt('timestamp'),
    source: text('source').notNull(),
    eventType: text('event_type').notNull(),
    description: text('description'),
    severity: text('severity').notNull().default('info'),
});

export const healthData = sqliteTable('health_data', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: createdAt('timestamp'),
    patientId: text('patient_id').notNull(),
    heartRate: integer('heart_rate'),
    heartRateAlert: flag('heart_rate_alert'),
    bloodPressureSystolic: integer('blood_pressure_systolic'),
    bloodPressureDiastolic: integer('blood_pressure_diastolic'),
    bloodPressureAlert: flag('blood_pressure_alert'),
    glucoseLevel: integer('glucose_level'),
    glucoseLevelAlert: flag('glucose_level_alert'),
    oxygenSaturation: integer('oxygen_saturation'),
    oxygenSaturationAlert: flag('oxygen_saturation_alert'),
    alertTriggered: flag('alert_triggered'),
    caregiverNotified: flag('caregiver_notified'),
});

export const safetyAlerts = sqliteTable('safety_alerts', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: createdAt('timestamp'),
    patientId: text('patient_id').notNull(),
    movementActivity: text('movement_activity'),
    fallDetected: flag('fall_detected'),
    impactForceLevel: text('impact_force_level'),
    postFallInactivity: integer('post_fall_inactivity'),
    location: text('location'),
    alertTriggered: flag('alert_triggered'),
    caregiverNotified: flag('caregiver_notified'),
    severity: text('severity'),
    resolved: flag('resolved'),
    resolvedTimestamp: integer('resolved_timestamp', { mode: 'timestamp_ms' }),
});

export const reminders = sqliteTable('reminders', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: createdAt('timestamp'),
    patientId: text('patient_id').notNull(),
    reminderType: text('reminder_type').notNull(),
    description: text('description'),
    scheduledTime: integer('scheduled_time', { mode: 'timestamp_ms' }).notNull(),
    recurrence: text('recurrence'),
    recurrenceDay: integer('recurrence_day'),
    priority: text('priority').notNull().default('medium'),
    completed: flag('completed'),
    completedTimestamp: integer('completed_timestamp', { mode: 'timestamp_ms' }),
    reminderSent: flag('reminder_sent'),
    acknowledged: flag('acknowledged'),
});

export type Patient = typeof patients.$inferSelect;
export type NewPatient = typeof patients.$inferInsert;
export type Caregiver = typeof caregivers.$inferSelect;
export type NewCaregiver = typeof caregivers.$inferInsert;
export type EventRecord = typeof events.$inferSelect;
export type NewEventRecord = typeof events.$inferInsert;
export type HealthReading = typeof healthData.$inferSelect;
export type NewHealthReading = typeof healthData.$inferInsert;
export type SafetyAlert = typeof safetyAlerts.$inferSelect;
export type NewSafetyAlert = typeof safetyAlerts.$inferInsert;
export type Reminder = typeof reminders.$inferSelect;
export type NewReminder = typeof reminders.$inferInsert;
