export { EmailNotifier, type EmailNotifierOptions } from './email_service';
export { getEmailClient, resetEmailClientForTests, NoopEmailClient, SmtpEmailClient } from './email_client';
export type { EmailClient, EmailSendParams } from './email_client';
