import { getEmailSettings } from '../config';
import { TransportError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface EmailClient {
     send(destination: string, message: string): Promise<void>;
}

export class HttpEmailClient implements EmailClient {
     constructor(
          private baseUrl: string,
          private apiKey: string
     ) {}

     send = async (destination: string, message: string): Promise<void> => {
          logger.info({ destination }, 'Email send call');

          const response = await fetch(`${this.baseUrl}/messages`, {
               method: 'POST',
               headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
               },
               body: JSON.stringify({
                    to: destination,
                    subject: message.split('\n')[0],
                    text: message,
               }),
          });

          if (!response.ok) {
               throw new TransportError(response.status, await response.text());
          }

          logger.info({ destination }, 'Email sent');
     };
}

/** Writes mail to the log instead of delivering it. */
export class LoggingEmailClient implements EmailClient {
     readonly sent: Array<{ destination: string; message: string }> = [];

     send = async (destination: string, message: string): Promise<void> => {
          this.sent.push({ destination, message });
          logger.info({ destination, message }, 'Email (not delivered)');
     };
}

export function createEmailClient(): EmailClient {
     const { clientType, apiUrl, apiKey } = getEmailSettings();

     if (clientType === 'log') {
          logger.info('Using logging email client');
          return new LoggingEmailClient();
     }

     if (!apiUrl || !apiKey) {
          throw new Error('EMAIL_API_URL and EMAIL_API_KEY must be set for HTTP client');
     }

     logger.info({ apiUrl }, 'Using HTTP email client');
     return new HttpEmailClient(apiUrl, apiKey);
}
