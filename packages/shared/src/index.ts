export * from './clients/DatabaseClient.js';
export * from './clients/LLMClient.js';
export * from './clients/TwilioClient.js';
export * from './config.js';
export * from './context.js';
export * from './db/schema.js';
export * from './repositories/EventRepository.js';
export * from './repositories/HealthDataRepository.js';
export * from './repositories/PeopleRepository.js';
export * from './repositories/ReminderRepository.js';
export * from './repositories/SafetyAlertRepository.js';
export * from './services/CsvImportService.js';
export * from './services/DeviceInventoryService.js';
export * from './services/EventLogService.js';
export * from './services/SampleDataService.js';
export * from './types/queue-contracts.js';
export * from './types/records.js';
export * from './utils/dates.js';
export * from './utils/serializers.js';
