import 'dotenv/config';
import { DatabaseClient, DeviceInventoryService, createDataContext, loadConfig } from '@carewatch/shared';

async function listDevices() {
    const config = loadConfig();
    const databaseClient = DatabaseClient.getInstance(config.databasePath);
    const inventory = new DeviceInventoryService(createDataContext(databaseClient.db));

    try {
        const devices = await inventory.listDevices();

        console.log('Patients:');
        for (const patient of devices.patients) {
            console.log(`  ${patient.patient_id}: ${patient.name}`);
        }

        console.log(`Health devices: ${devices.health.join(', ') || 'none'}`);
        console.log(`Safety devices: ${devices.safety.join(', ') || 'none'}`);
        console.log(`Reminder devices: ${devices.reminders.join(', ') || 'none'}`);
        console.log(`All devices: ${devices.all.join(', ') || 'none'}`);
    } finally {
        databaseClient.close();
    }
}

listDevices().catch((error: unknown) => {
    console.error('Listing devices failed:', error);
    process.exitCode = 1;
});
