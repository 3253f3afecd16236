/**
 * Permit Document Rendering
 *
 * Renders the consent and the payment instructions of a draft as DOCX files.
 * Output file names depend only on the request id, so rendering the same
 * request again overwrites the previous files.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { AlignmentType, Document, HeadingLevel, Packer, Paragraph } from "docx";
import { removeFiles } from "../lib/files";
import type { CanonicalRecord, DocumentPaths, DocumentType } from "../types/permit";

// ============================================================================
// Types
// ============================================================================

export interface DocumentRenderer {
  render(record: CanonicalRecord, requestId: string): Promise<DocumentPaths>;
  /** Deletes every rendered document and resolves with how many were removed. */
  purge(): Promise<number>;
}

export type Block = { kind: "title" | "heading" | "text" | "bullet"; text: string };

export interface DocxRendererOptions {
  outputDir: string;
  paymentAccount: string;
  paymentDueDays: number;
  clock?: () => Date;
}

export const DOCUMENT_TYPES: readonly DocumentType[] = ["consent", "payment"];

const CONDITIONS = [
  "Žadatel je povinen dodržovat všechny platné právní předpisy.",
  "Užívání je povoleno pouze v uvedeném rozsahu a době.",
  "Žadatel odpovídá za případné škody způsobené užíváním.",
];

// ============================================================================
// Content
// ============================================================================

/**
 * dd.mm.yyyy in UTC.
 */
export function formatDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${day}.${month}.${date.getUTCFullYear()}`;
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

export function consentBlocks(
  record: CanonicalRecord,
  requestId: string,
  issuedAt: Date,
  paymentDueDays: number
): Block[] {
  const blocks: Block[] = [
    { kind: "title", text: "SOUHLAS K ZVLÁŠTNÍMU UŽÍVÁNÍ VEŘEJNÉHO PROSTRANSTVÍ" },
    { kind: "text", text: `Číslo žádosti: ${requestId}` },
    { kind: "text", text: `Datum vystavení: ${formatDate(issuedAt)}` },
    { kind: "heading", text: "Údaje žadatele:" },
    { kind: "text", text: `Jméno/Název: ${record.applicantName ?? "N/A"}` },
  ];
  if (record.companyId) {
    blocks.push({ kind: "text", text: `IČO: ${record.companyId}` });
  }
  if (record.contactDetails) {
    blocks.push({ kind: "text", text: `Kontakt: ${record.contactDetails}` });
  }

  blocks.push(
    { kind: "heading", text: "Údaje o užívání:" },
    { kind: "text", text: `Účel užívání: ${record.purposeOfUse ?? "N/A"}` },
    { kind: "text", text: `Místo: ${record.location ?? "N/A"}` },
    { kind: "text", text: `Doba užívání: ${record.durationText ?? "N/A"} (${record.durationDays} dní)` }
  );
  if (record.areaSqm > 0) {
    blocks.push({ kind: "text", text: `Výměra: ${record.areaSqm} m²` });
  }
  blocks.push(
    { kind: "text", text: `Poplatek: ${record.feeCzk} Kč` },
    { kind: "heading", text: "Podmínky:" },
    ...CONDITIONS.map((text): Block => ({ kind: "bullet", text })),
    { kind: "bullet", text: `Poplatek je splatný do ${paymentDueDays} dnů od vystavení tohoto souhlasu.` }
  );
  return blocks;
}

export function paymentBlocks(
  record: CanonicalRecord,
  requestId: string,
  issuedAt: Date,
  paymentAccount: string,
  paymentDueDays: number
): Block[] {
  return [
    { kind: "title", text: "PLATEBNÍ INSTRUKCE" },
    { kind: "text", text: `Číslo žádosti: ${requestId}` },
    { kind: "text", text: `Částka k úhradě: ${record.feeCzk} Kč` },
    { kind: "text", text: `Variabilní symbol: ${record.variableSymbol}` },
    { kind: "text", text: `Číslo účtu: ${paymentAccount}` },
    { kind: "text", text: `Splatnost: ${formatDate(addDays(issuedAt, paymentDueDays))}` },
    { kind: "text", text: "Prosím uhraďte poplatek ve stanovené lhůtě." },
  ];
}

// ============================================================================
// DOCX Generation
// ============================================================================

function toParagraph(block: Block): Paragraph {
  switch (block.kind) {
    case "title":
      return new Paragraph({
        text: block.text,
        heading: HeadingLevel.TITLE,
        alignment: AlignmentType.CENTER,
        spacing: { after: 400 },
      });
    case "heading":
      return new Paragraph({ text: block.text, heading: HeadingLevel.HEADING_2, spacing: { before: 200 } });
    case "bullet":
      return new Paragraph({ text: block.text, bullet: { level: 0 } });
    default:
      return new Paragraph({ text: block.text, spacing: { after: 100 } });
  }
}

export async function renderDocx(blocks: Block[]): Promise<Buffer> {
  const doc = new Document({
    sections: [{ children: blocks.map(toParagraph) }],
  });
  return Packer.toBuffer(doc);
}

export class DocxDocumentRenderer implements DocumentRenderer {
  private readonly clock: () => Date;

  constructor(private readonly options: DocxRendererOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  pathFor(docType: DocumentType, requestId: string): string {
    return path.join(this.options.outputDir, `${docType}_${requestId}.docx`);
  }

  async render(record: CanonicalRecord, requestId: string): Promise<DocumentPaths> {
    const { outputDir, paymentAccount, paymentDueDays } = this.options;
    const issuedAt = this.clock();
    await mkdir(outputDir, { recursive: true });

    const documents: Record<DocumentType, Block[]> = {
      consent: consentBlocks(record, requestId, issuedAt, paymentDueDays),
      payment: paymentBlocks(record, requestId, issuedAt, paymentAccount, paymentDueDays),
    };

    const paths: DocumentPaths = {};
    for (const docType of DOCUMENT_TYPES) {
      const target = this.pathFor(docType, requestId);
      await writeFile(target, await renderDocx(documents[docType]));
      paths[docType] = target;
    }
    return paths;
  }

  async purge(): Promise<number> {
    return removeFiles(this.options.outputDir);
  }
}
