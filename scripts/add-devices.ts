import 'dotenv/config';
import { DatabaseClient, SAMPLE_DEVICE_IDS, SampleDataService, createDataContext, loadConfig } from '@carewatch/shared';

async function addDevices() {
    const config = loadConfig();
    const databaseClient = DatabaseClient.getInstance(config.databasePath);
    const samples = new SampleDataService(createDataContext(databaseClient.db));

    try {
        const added = await samples.addDeviceData();
        console.log(`Added ${added.health} health, ${added.safety} safety and ${added.reminders} reminder records for ${SAMPLE_DEVICE_IDS.join(', ')}`);
    } finally {
        databaseClient.close();
    }
}

addDevices().catch((error: unknown) => {
    console.error('Adding device data failed:', error);
    process.exitCode = 1;
});
