import 'dotenv/config';
import { DatabaseClient, SampleDataService, createDataContext, loadConfig } from '@carewatch/shared';

async function addSampleData() {
    const config = loadConfig();
    const databaseClient = DatabaseClient.getInstance(config.databasePath);
    const samples = new SampleDataService(createDataContext(databaseClient.db));

    try {
        const people = await samples.createSamplePatientAndCaregiver();
        console.log(`Patient ${people.patientCreated ? 'created' : 'already present'}, caregiver ${people.caregiverCreated ? 'created' : 'already present'}`);

        const seeded = await samples.createAdditionalSampleDevices();
        console.log(`Seeded ${seeded.health} health, ${seeded.safety} safety and ${seeded.reminders} reminder records`);
    } finally {
        databaseClient.close();
    }
}

addSampleData().catch((error: unknown) => {
    console.error('Adding sample data failed:', error);
    process.exitCode = 1;
});
