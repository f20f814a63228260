import Twilio from 'twilio';

export interface TwilioConfigs {
    accountSid: string;
    authToken: string;
    fromNumber: string;
}

export interface MessageResult {
    success: boolean;
    message: string;
    messageSid?: string;
    error?: string;
}

export class TwilioClient {
    private client: ReturnType<typeof Twilio>;
    private configs: TwilioConfigs;

    constructor(configs: TwilioConfigs) {
        this.configs = configs;
        this.client = Twilio(configs.accountSid, configs.authToken);
    }

    async sendSms(to: string, body: string): Promise<MessageResult> {
        try {
            const message = await this.client.messages.create({
                from: this.configs.fromNumber,
                to,
                body
            });

            console.log('[TwilioClient] SMS sent:', { to, sid: message.sid });

            return {
                success: true,
                message: 'SMS sent successfully',
                messageSid: message.sid
            };
        } catch (error) {
            console.error('[TwilioClient] Error sending SMS:', error);
            return {
                success: false,
                message: 'Failed to send SMS',
                error: error instanceof Error ? error.message : 'Unknown error'
            };
        }
    }
}
