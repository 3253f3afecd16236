import test, { mock } from 'node:test';
import assert from 'node:assert/strict';
import nodemailer from 'nodemailer';

import type { MailConfig } from '../../lib/config';
import { silentLogger } from '../../lib/logger';
import type { Draft } from '../../types/permit';
import { applicantEmail, draftApprovedMessage, draftCreatedMessage, EmailNotifier } from '../index';

const MAIL: MailConfig = {
  port: 587,
  from: 'podatelna@example.test',
  clerkEmail: 'clerk@example.test',
};

const TERMS = { paymentAccount: '123456789/0100', paymentDueDays: 30 };

function makeDraft(overrides: Partial<Draft['record']> = {}, documentPaths: Draft['documentPaths'] = {}): Draft {
  return {
    id: 'req-1',
    createdAt: '2025-05-01T08:00:00.000Z',
    status: 'pending_approval',
    documentPaths,
    record: {
      applicantName: 'Eva Dvořáková',
      companyId: null,
      contactDetails: 'Tel. 777 000 111, eva@example.test',
      purposeOfUse: 'Stánek',
      location: 'Park u nádraží',
      durationText: null,
      durationDays: 7,
      durationResolved: false,
      areaSqm: 4,
      feeCzk: 280,
      variableSymbol: '0000012345',
      ...overrides,
    },
  };
}

test('applicantEmail: first address in the contact details', () => {
  assert.equal(applicantEmail(makeDraft()), 'eva@example.test');
  assert.equal(applicantEmail(makeDraft({ contactDetails: '777 000 111' })), null);
  assert.equal(applicantEmail(makeDraft({ contactDetails: null })), null);
});

test('draftCreatedMessage: addressed to the clerk', () => {
  const message = draftCreatedMessage(makeDraft(), 'clerk@example.test');

  assert.equal(message.to, 'clerk@example.test');
  assert.equal(message.subject, 'Nový koncept ZUVP - Eva Dvořáková');
  assert.equal(
    message.text,
    [
      'Nový koncept žádosti o ZUVP byl vytvořen:',
      '',
      'Žadatel: Eva Dvořáková',
      'Místo: Park u nádraží',
      'Účel: Stánek',
      'Poplatek: 280 Kč',
      'VS: 0000012345',
      '',
      'Prosím zkontrolujte a schvalte v systému.',
      '',
      'ID žádosti: req-1',
    ].join('\n')
  );
});

test('draftApprovedMessage: attaches the rendered documents', () => {
  const draft = makeDraft({}, { consent: '/out/consent_req-1.docx', payment: '/out/payment_req-1.docx' });
  const message = draftApprovedMessage(draft, 'eva@example.test', TERMS);

  assert.equal(message.to, 'eva@example.test');
  assert.equal(message.subject, 'Souhlas se zvláštním užíváním veřejného prostranství');
  assert.deepEqual(message.attachments, [
    { path: '/out/consent_req-1.docx' },
    { path: '/out/payment_req-1.docx' },
  ]);
  assert.equal(typeof message.text, 'string');
  const lines = String(message.text).split('\n');
  assert.equal(lines[0], 'Vážený pane/paní Eva Dvořáková,');
  assert.equal(lines.includes('Účet: 123456789/0100'), true);
  assert.equal(lines.includes('Variabilní symbol: 0000012345'), true);
  assert.equal(lines.includes('Splatnost: 30 dnů od vystavení'), true);
});

test('EmailNotifier: sends the clerk notification from the configured sender', async () => {
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  const sendMail = mock.method(transporter, 'sendMail');
  const notifier = new EmailNotifier(MAIL, TERMS, silentLogger(), transporter);

  await notifier.draftCreated(makeDraft());

  assert.equal(sendMail.mock.calls.length, 1);
  const [options] = sendMail.mock.calls[0].arguments;
  assert.equal(options.from, 'podatelna@example.test');
  assert.equal(options.to, 'clerk@example.test');
  assert.equal(options.subject, 'Nový koncept ZUVP - Eva Dvořáková');
});

test('EmailNotifier: approval e-mail goes to the applicant', async () => {
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  const sendMail = mock.method(transporter, 'sendMail');
  const notifier = new EmailNotifier(MAIL, TERMS, silentLogger(), transporter);

  await notifier.draftApproved(makeDraft());

  assert.equal(sendMail.mock.calls.length, 1);
  assert.equal(sendMail.mock.calls[0].arguments[0].to, 'eva@example.test');
});

test('EmailNotifier: approval without an applicant address sends nothing', async () => {
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  const sendMail = mock.method(transporter, 'sendMail');
  const notifier = new EmailNotifier(MAIL, TERMS, silentLogger(), transporter);

  await notifier.draftApproved(makeDraft({ contactDetails: 'Tel. 777 000 111' }));

  assert.equal(sendMail.mock.calls.length, 0);
});

test('EmailNotifier: without SMTP settings notifications are skipped', async () => {
  const notifier = new EmailNotifier(MAIL, TERMS, silentLogger());

  await notifier.draftCreated(makeDraft());
  await notifier.draftApproved(makeDraft());
});
