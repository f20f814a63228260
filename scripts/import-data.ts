import 'dotenv/config';
import { CsvImportService, DatabaseClient, createDataContext, loadConfig } from '@carewatch/shared';

async function importData() {
    const config = loadConfig();
    const databaseClient = DatabaseClient.getInstance(config.databasePath);
    const importService = new CsvImportService(createDataContext(databaseClient.db), config.dataDir);

    console.log(`=== Importing CSV data from ${config.dataDir} ===\n`);

    try {
        const counts = await importService.importAll();
        console.log(`\nImported ${counts.health} health, ${counts.safety} safety and ${counts.reminders} reminder records`);
    } finally {
        databaseClient.close();
    }
}

importData().catch((error: unknown) => {
    console.error('Import failed:', error);
    process.exitCode = 1;
});
