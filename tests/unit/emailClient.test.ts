import {
     createEmailClient,
     HttpEmailClient,
     LoggingEmailClient,
} from '@allocation/shared/src/clients/email-client';
import { TransportError } from '@allocation/shared/src/utils/errors';

describe('Email client', () => {
     afterEach(() => {
          process.env.EMAIL_CLIENT_TYPE = 'log';
          delete process.env.EMAIL_API_URL;
          delete process.env.EMAIL_API_KEY;
          jest.restoreAllMocks();
     });

     describe('createEmailClient factory', () => {
          it('should create a logging client by default', () => {
               delete process.env.EMAIL_CLIENT_TYPE;
               expect(createEmailClient()).toBeInstanceOf(LoggingEmailClient);
          });

          it('should create HTTP client when EMAIL_CLIENT_TYPE is http', () => {
               process.env.EMAIL_CLIENT_TYPE = 'http';
               process.env.EMAIL_API_URL = 'https://mail.example.com';
               process.env.EMAIL_API_KEY = 'test-key';

               expect(createEmailClient()).toBeInstanceOf(HttpEmailClient);
          });

          it('should throw error when HTTP client missing URL', () => {
               process.env.EMAIL_CLIENT_TYPE = 'http';
               process.env.EMAIL_API_KEY = 'test-key';

               expect(() => createEmailClient()).toThrow(
                    'EMAIL_API_URL and EMAIL_API_KEY must be set for HTTP client'
               );
          });

          it('should throw error when HTTP client missing API key', () => {
               process.env.EMAIL_CLIENT_TYPE = 'http';
               process.env.EMAIL_API_URL = 'https://mail.example.com';

               expect(() => createEmailClient()).toThrow(
                    'EMAIL_API_URL and EMAIL_API_KEY must be set for HTTP client'
               );
          });
     });

     describe('LoggingEmailClient', () => {
          it('should record mail instead of sending it', async () => {
               const client = new LoggingEmailClient();
               const { send } = client;

               await send('ops@example.com', 'Out of stock for CHAIR');

               expect(client.sent).toEqual([
                    { destination: 'ops@example.com', message: 'Out of stock for CHAIR' },
               ]);
          });
     });

     describe('HttpEmailClient', () => {
          it('should post the message with the API key', async () => {
               const fetchMock = jest
                    .spyOn(global, 'fetch')
                    .mockResolvedValue(new Response(null, { status: 202 }));
               const { send } = new HttpEmailClient('https://mail.example.com', 'test-key');

               await send('ops@example.com', 'Out of stock for CHAIR');

               expect(fetchMock).toHaveBeenCalledWith('https://mail.example.com/messages', {
                    method: 'POST',
                    headers: {
                         Authorization: 'Bearer test-key',
                         'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                         to: 'ops@example.com',
                         subject: 'Out of stock for CHAIR',
                         text: 'Out of stock for CHAIR',
                    }),
               });
          });

          it('should raise a retriable TransportError on 503', async () => {
               jest.spyOn(global, 'fetch').mockResolvedValue(
                    new Response('maintenance', { status: 503 })
               );
               const client = new HttpEmailClient('https://mail.example.com', 'test-key');

               const failure = client.send('ops@example.com', 'hello');

               await expect(failure).rejects.toBeInstanceOf(TransportError);
               await expect(failure).rejects.toMatchObject({
                    statusCode: 503,
                    message: 'maintenance',
                    retriable: true,
               });
          });
     });
});
