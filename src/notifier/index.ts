/**
 * Draft Notifications
 *
 * E-mails the clerk when a draft is waiting for approval and the applicant
 * when it has been approved. Uses nodemailer over SMTP; when SMTP is not
 * configured, messages are logged and skipped.
 */

import nodemailer, { type SendMailOptions, type Transporter } from 'nodemailer';
import type { MailConfig } from '../lib/config';
import type { Logger } from '../lib/logger';
import type { Draft } from '../types/permit';

/**
 * Consumed fire-and-forget by the pipeline; nothing is done with the result.
 */
export interface Notifier {
  draftCreated(draft: Draft): Promise<void>;
  draftApproved(draft: Draft): Promise<void>;
}

export interface PaymentTerms {
  paymentAccount: string;
  paymentDueDays: number;
}

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

/**
 * First e-mail address found in the applicant's contact details.
 */
export function applicantEmail(draft: Draft): string | null {
  const match = draft.record.contactDetails?.match(EMAIL_PATTERN);
  return match ? match[0] : null;
}

export function draftCreatedMessage(draft: Draft, clerkEmail: string): SendMailOptions {
  const { record } = draft;
  return {
    to: clerkEmail,
    subject: `Nový koncept ZUVP - ${record.applicantName ?? 'N/A'}`,
    text: [
      'Nový koncept žádosti o ZUVP byl vytvořen:',
      '',
      `Žadatel: ${record.applicantName ?? 'N/A'}`,
      `Místo: ${record.location ?? 'N/A'}`,
      `Účel: ${record.purposeOfUse ?? 'N/A'}`,
      `Poplatek: ${record.feeCzk} Kč`,
      `VS: ${record.variableSymbol}`,
      '',
      'Prosím zkontrolujte a schvalte v systému.',
      '',
      `ID žádosti: ${draft.id}`,
    ].join('\n'),
  };
}

export function draftApprovedMessage(draft: Draft, to: string, terms: PaymentTerms): SendMailOptions {
  const { record } = draft;
  return {
    to,
    subject: 'Souhlas se zvláštním užíváním veřejného prostranství',
    text: [
      record.applicantName ? `Vážený pane/paní ${record.applicantName},` : 'Vážený pane/paní,',
      '',
      'v příloze zasíláme souhlas se zvláštním užíváním veřejného prostranství dle Vaší žádosti.',
      '',
      'Platební údaje:',
      `Účet: ${terms.paymentAccount}`,
      `Variabilní symbol: ${record.variableSymbol}`,
      `Částka: ${record.feeCzk} Kč`,
      `Splatnost: ${terms.paymentDueDays} dnů od vystavení`,
      '',
      'S pozdravem,',
      'Městský úřad',
    ].join('\n'),
    attachments: Object.values(draft.documentPaths).map((documentPath) => ({ path: documentPath })),
  };
}

export class EmailNotifier implements Notifier {
  private readonly transporter: Transporter | null;
  private readonly logger: Logger;

  constructor(
    private readonly mail: MailConfig,
    private readonly terms: PaymentTerms,
    logger: Logger,
    transporter?: Transporter
  ) {
    this.logger = logger.child({ component: 'notifier' });
    this.transporter = transporter ?? EmailNotifier.createTransporter(mail);
    if (!this.transporter) {
      this.logger.warn('SMTP not configured - e-mail notifications are disabled');
    }
  }

  private static createTransporter(mail: MailConfig): Transporter | null {
    if (!mail.host || !mail.user || !mail.password) {
      return null;
    }
    return nodemailer.createTransport({
      host: mail.host,
      port: mail.port,
      secure: mail.port === 465,
      requireTLS: mail.port === 587,
      auth: { user: mail.user, pass: mail.password },
      connectionTimeout: 10_000,
      socketTimeout: 30_000,
    });
  }

  async draftCreated(draft: Draft): Promise<void> {
    await this.send(draftCreatedMessage(draft, this.mail.clerkEmail), draft.id);
  }

  async draftApproved(draft: Draft): Promise<void> {
    const to = applicantEmail(draft);
    if (!to) {
      this.logger.info({ draftId: draft.id }, 'No applicant e-mail in contact details, approval e-mail not sent');
      return;
    }
    await this.send(draftApprovedMessage(draft, to, this.terms), draft.id);
  }

  private async send(message: SendMailOptions, draftId: string): Promise<void> {
    if (!this.transporter) {
      this.logger.debug({ draftId, subject: message.subject }, 'E-mail skipped, SMTP not configured');
      return;
    }
    await this.transporter.sendMail({ from: this.mail.from, ...message });
    this.logger.info({ draftId, to: message.to, subject: message.subject }, 'E-mail sent');
  }
}
