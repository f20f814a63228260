import 'dotenv/config';
import { DatabaseClient, DeviceInventoryService, createDataContext, describeDeviceCheck, loadConfig } from '@carewatch/shared';

// Usage: npm run check-devices -- D1000 D2000
async function checkDevices(deviceIds: string[]) {
    const config = loadConfig();
    const databaseClient = DatabaseClient.getInstance(config.databasePath);
    const inventory = new DeviceInventoryService(createDataContext(databaseClient.db));

    try {
        for (const deviceId of deviceIds) {
            const check = await inventory.checkDevice(deviceId);
            console.log(describeDeviceCheck(check).join('\n'));
        }

        const totals = await inventory.summary();
        console.log(`\nTotals: ${totals.health_records} health, ${totals.safety_records} safety, ${totals.reminder_records} reminder records`);
    } finally {
        databaseClient.close();
    }
}

const requested = process.argv.slice(2);
checkDevices(requested.length > 0 ? requested : ['D1000', 'D2000', 'D3000']).catch((error: unknown) => {
    console.error('Device check failed:', error);
    process.exitCode = 1;
});
