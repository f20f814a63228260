import type { TwilioClient } from '@carewatch/shared';

export interface CaregiverMessage {
    caregiverId: string;
    to: string;
    body: string;
}

export interface NotificationResult {
    delivered: boolean;
    channel: string;
    error?: string;
}

export interface Notifier {
    readonly channel: string;
    send(message: CaregiverMessage): Promise<NotificationResult>;
}

export class SmsNotifier implements Notifier {
    readonly channel = 'sms';

    constructor(private readonly twilioClient: TwilioClient) {}

    async send(message: CaregiverMessage): Promise<NotificationResult> {
        const result = await this.twilioClient.sendSms(message.to, message.body);
        return { delivered: result.success, channel: this.channel, error: result.error };
    }
}

// Used when no SMS provider is configured
export class ConsoleNotifier implements Notifier {
    readonly channel = 'console';

    async send(message: CaregiverMessage): Promise<NotificationResult> {
        console.log(`[ConsoleNotifier] To ${message.caregiverId} (${message.to}): ${message.body}`);
        return { delivered: true, channel: this.channel };
    }
}
