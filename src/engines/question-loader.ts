/**
 * Question Source Loader
 *
 * Reads the questionnaire from a spreadsheet (.xlsx, or .csv) into a flat,
 * ordered list of questions. Category, sub-factor and actor cells carry
 * forward down blank rows. Any problem with the source falls back to a small
 * embedded questionnaire so the rest of the server stays usable.
 */

import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import ExcelJS from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';

import {
  type Question,
  type QuestionContext,
  createLikertQuestion,
  createYesNoQuestion,
} from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Header names expected in the first row of the sheet
 */
export const SOURCE_COLUMNS = {
  category: 'CHANNELS',
  subfactor: 'FACTORS',
  actor: 'ACTORS',
  likert: '1 - Strongly disagree / Not at all true | 7 - Strongly agree / Fully true',
  yesno: 'yes/no',
} as const;

export type SourceColumn = keyof typeof SOURCE_COLUMNS;

/**
 * Question cells must be longer than this (after trimming) to count.
 * Shorter entries are stray notes and numbering.
 */
export const MIN_QUESTION_TEXT_LENGTH = 10;

/**
 * One sheet row, reduced to the columns the loader reads
 */
export type SourceRow = Partial<Record<SourceColumn, string | null>>;

/**
 * Sheet holding the questionnaire in the published workbook
 */
export const DEFAULT_SHEET_NAME = '1) self-assessment tool';

export interface LoadOptions {
  /** Worksheet to read; {@link DEFAULT_SHEET_NAME} or else the first worksheet when omitted */
  sheetName?: string | undefined;
}

export interface LoadResult {
  questions: Question[];
  source: 'file' | 'fallback';
  /** Why the fallback list was used */
  reason?: string;
}

const FALLBACK_CATEGORY = 'n.1 Academia-Industry joint research & mobility';
const ACADEMIA = 'ACADEMIA incl. research and technology organisations';
const INDUSTRY = 'INDUSTRY incl. SMEs and start-ups';

/**
 * Embedded questionnaire: one category, every sub-factor, both question kinds.
 */
export function getFallbackQuestions(): Question[] {
  const context = (subfactor: string, actor: string): QuestionContext => ({
    category: FALLBACK_CATEGORY,
    subfactor,
    actor,
  });

  return [
    createLikertQuestion(
      'q_0',
      'National/regional policy frameworks effectively support sustained industry–academia co-creation.',
      context('env', ACADEMIA)
    ),
    createYesNoQuestion(
      'q_1',
      'Are there formal joint research agreements with industry?',
      context('env', ACADEMIA)
    ),
    createLikertQuestion(
      'q_2',
      'IP/data governance policies are adapted to enable equitable sharing in joint R&I.',
      context('org', INDUSTRY)
    ),
    createYesNoQuestion(
      'q_3',
      'Are research infrastructures co-governed or co-used with industry (e.g. joint labs, testbeds)?',
      context('org', ACADEMIA)
    ),
    createLikertQuestion(
      'q_4',
      'Researchers receive training or mentoring for working with industrial partners.',
      context('ind', ACADEMIA)
    ),
    createYesNoQuestion(
      'q_5',
      'Are researchers formally authorised to lead or co-lead joint projects with industry?',
      context('ind', ACADEMIA)
    ),
  ];
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function questionText(value: string | null | undefined): string | null {
  const trimmed = nonEmpty(value);
  return trimmed !== null && trimmed.length > MIN_QUESTION_TEXT_LENGTH ? trimmed : null;
}

/**
 * Turn sheet rows into questions.
 *
 * IDs are `q_<n>`, assigned in row order and, within a row, Likert before yes/no.
 * Rows without question text still update the carried-forward context.
 */
export function extractQuestions(rows: readonly SourceRow[]): Question[] {
  const questions: Question[] = [];
  const context: QuestionContext = { category: null, subfactor: null, actor: null };

  for (const row of rows) {
    context.category = nonEmpty(row.category) ?? context.category;
    context.subfactor = nonEmpty(row.subfactor) ?? context.subfactor;
    context.actor = nonEmpty(row.actor) ?? context.actor;

    const likertText = questionText(row.likert);
    if (likertText !== null) {
      questions.push(createLikertQuestion(`q_${questions.length}`, likertText, { ...context }));
    }

    const yesNoText = questionText(row.yesno);
    if (yesNoText !== null) {
      questions.push(createYesNoQuestion(`q_${questions.length}`, yesNoText, { ...context }));
    }
  }

  return questions;
}

/**
 * Plain text of a cell, whatever kind of value exceljs produced
 */
export function cellText(value: CellValue): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('result' in value) return value.result === undefined ? null : cellText(value.result);
  // error cells (#N/A, #REF!, ...)
  return null;
}

async function readWorksheet(filePath: string, sheetName?: string): Promise<Worksheet> {
  const workbook = new ExcelJS.Workbook();

  if (extname(filePath).toLowerCase() === '.csv') {
    return workbook.csv.readFile(filePath);
  }

  await workbook.xlsx.readFile(filePath);
  const worksheet = sheetName
    ? workbook.getWorksheet(sheetName)
    : (workbook.getWorksheet(DEFAULT_SHEET_NAME) ?? workbook.worksheets[0]);
  if (!worksheet) {
    throw new Error(sheetName ? `Worksheet not found: ${sheetName}` : 'Workbook has no worksheets');
  }
  return worksheet;
}

/**
 * Read data rows below the header, keyed by source column.
 *
 * @throws {Error} If any expected header is missing
 */
export function readSourceRows(worksheet: Worksheet): SourceRow[] {
  const headerIndex = new Map<string, number>();
  worksheet.getRow(1).eachCell((cell, colNumber) => {
    const header = cellText(cell.value)?.trim();
    if (header && !headerIndex.has(header)) {
      headerIndex.set(header, colNumber);
    }
  });

  const columns = Object.entries(SOURCE_COLUMNS).map(([key, header]) => ({
    key,
    header,
    index: headerIndex.get(header),
  }));
  const missing = columns.filter((column) => column.index === undefined).map((column) => column.header);
  if (missing.length > 0) {
    throw new Error(`Missing required columns: ${missing.join(', ')}`);
  }

  const rows: SourceRow[] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const sourceRow: SourceRow = {};
    for (const column of columns) {
      if (column.index !== undefined && isSourceColumn(column.key)) {
        const cell = row.getCell(column.index);
        // only the top-left cell of a merged range holds the value
        sourceRow[column.key] = cell.isMerged && cell.master.address !== cell.address ? null : cellText(cell.value);
      }
    }
    rows.push(sourceRow);
  }
  return rows;
}

function isSourceColumn(key: string): key is SourceColumn {
  return key in SOURCE_COLUMNS;
}

function fallback(reason: string): LoadResult {
  const questions = getFallbackQuestions();
  logger.warn('Using fallback questions', undefined, { reason, count: questions.length });
  return { questions, source: 'fallback', reason };
}

/**
 * Load questions from a spreadsheet. Never throws: a missing or unreadable
 * source, or one without the expected columns, yields the fallback list.
 */
export async function loadQuestions(filePath: string, options: LoadOptions = {}): Promise<LoadResult> {
  if (!existsSync(filePath)) {
    return fallback(`Question source not found: ${filePath}`);
  }

  try {
    const worksheet = await readWorksheet(filePath, options.sheetName);
    const questions = extractQuestions(readSourceRows(worksheet));
    logger.info('Loaded questions from source', { filePath, count: questions.length });
    return { questions, source: 'file' };
  } catch (error) {
    logger.error('Failed to read question source', error, { filePath });
    const message = error instanceof Error ? error.message : String(error);
    return fallback(`Question source unreadable: ${message}`);
  }
}
