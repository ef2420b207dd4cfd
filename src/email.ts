// Email module - delivers the digest over SMTP
import { createTransport, type SendMailOptions } from 'nodemailer';
import type { Config } from './config';

export interface DigestEmail {
  recipients: readonly string[];
  subject: string;
  html: string;
}

export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
}

export function createMailTransport(
  config: Pick<Config, 'smtpHost' | 'smtpPort' | 'smtpUser' | 'smtpPass'>
): MailTransport {
  return createTransport({
    host: config.smtpHost,
    port: config.smtpPort,
    secure: config.smtpPort === 465, // implicit TLS on 465, STARTTLS otherwise
    auth: {
      user: config.smtpUser,
      pass: config.smtpPass,
    },
  });
}

/**
 * Send the digest; returns false when there was nobody to send it to
 */
export async function sendDigestEmail(
  email: DigestEmail,
  from: string,
  transport: MailTransport
): Promise<boolean> {
  if (email.recipients.length === 0) {
    console.warn('  No active recipients, email not sent');
    return false;
  }

  const info = await transport.sendMail({
    from,
    to: email.recipients.join(', '),
    subject: email.subject,
    html: email.html,
  });
  console.log(`  Email sent to ${email.recipients.join(', ')} (${info.messageId})`);
  return true;
}
