import { asc, eq } from 'drizzle-orm';
import type { CareDatabase } from '../clients/DatabaseClient.js';
import {
    caregivers,
    patients,
    type Caregiver,
    type NewCaregiver,
    type NewPatient,
    type Patient
} from '../db/schema.js';

export class PeopleRepository {
    constructor(private readonly db: CareDatabase) {}

    async findPatient(patientId: string): Promise<Patient | undefined> {
        return this.db.select().from(patients).where(eq(patients.patientId, patientId)).get();
    }

    async findAllPatients(): Promise<Patient[]> {
        return this.db.select().from(patients).orderBy(asc(patients.patientId)).all();
    }

    async createPatient(data: NewPatient): Promise<Patient> {
        try {
            return this.db.insert(patients).values(data).returning().get();
        } catch (error) {
            console.error('[PeopleRepository] Unable to create patient:', error);
            throw error;
        }
    }

    async findCaregiver(caregiverId: string): Promise<Caregiver | undefined> {
        return this.db.select().from(caregivers).where(eq(caregivers.caregiverId, caregiverId)).get();
    }

    async createCaregiver(data: NewCaregiver): Promise<Caregiver> {
        try {
            return this.db.insert(caregivers).values(data).returning().get();
        } catch (error) {
            console.error('[PeopleRepository] Unable to create caregiver:', error);
            throw error;
        }
    }

    async findCaregiversFor(monitoredId: string): Promise<Caregiver[]> {
        try {
            const all = this.db.select().from(caregivers).orderBy(asc(caregivers.caregiverId)).all();
            return all.filter(caregiver => monitoredIds(caregiver).includes(monitoredId));
        } catch (error) {
            console.error('[PeopleRepository] Unable to find caregivers:', error);
            throw error;
        }
    }
}

export function monitoredIds(caregiver: Pick<Caregiver, 'patients'>): string[] {
    return (caregiver.patients ?? '')
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0);
}
