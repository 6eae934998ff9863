import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Services } from '../services/index.js';
import type { SessionSummary } from '../storage/index.js';
import type { AssessmentSession } from '../types/index.js';
import { computeScores } from '../engines/score-aggregator.js';
import { exportJson, responsesToCsv, scoresToCsv } from '../engines/report.js';
import { StorageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { resolveWithinRoot } from '../utils/path-security.js';
import { requireSession, SessionIdSchema } from './shared.js';

/**
 * assessment_session - Unified session management tool
 *
 * Lifecycle, data access and export in one tool.
 */
export const sessionTool: Tool = {
  name: 'assessment_session',
  description: `Manage stored assessment sessions.

## Actions

- **list** - List sessions, most recently updated first
- **load** - Return a stored session document
- **delete** - Delete a session
- **export** - Export a session as JSON, or as CSV (answers or scores)
- **backup** - Write every session into one timestamped JSON file

## Examples

List sessions:
\`\`\`json
{ "action": "list", "limit": 20 }
\`\`\`

Export answers as CSV:
\`\`\`json
{ "action": "export", "sessionId": "session-xxx", "format": "csv", "csvType": "responses" }
\`\`\`

Back up into a sub-directory of the configured backup directory:
\`\`\`json
{ "action": "backup", "directory": "2024-q4" }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['list', 'load', 'delete', 'export', 'backup'],
        description: 'Action to perform',
      },
      sessionId: {
        type: 'string',
        description: 'Session ID (for load, delete, export)',
      },
      status: {
        type: 'string',
        enum: ['in-progress', 'completed'],
        description: 'Filter by status (for list action)',
      },
      limit: {
        type: 'number',
        description: 'Max results to return (for list action)',
      },
      format: {
        type: 'string',
        enum: ['json', 'csv'],
        description: 'Export format (for export action, default json)',
      },
      csvType: {
        type: 'string',
        enum: ['responses', 'scores'],
        description: 'CSV content (for export action, default responses)',
      },
      directory: {
        type: 'string',
        description: 'Backup location inside the configured backup directory (for backup action)',
      },
    },
    required: ['action'],
  },
};

const SessionInputSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('list'),
    status: z.enum(['in-progress', 'completed']).optional(),
    limit: z.number().int().positive().max(500).default(50),
  }),
  z.object({
    action: z.literal('load'),
    sessionId: SessionIdSchema,
  }),
  z.object({
    action: z.literal('delete'),
    sessionId: SessionIdSchema,
  }),
  z.object({
    action: z.literal('export'),
    sessionId: SessionIdSchema,
    format: z.enum(['json', 'csv']).default('json'),
    csvType: z.enum(['responses', 'scores']).default('responses'),
  }),
  z.object({
    action: z.literal('backup'),
    directory: z.string().min(1).optional(),
  }),
]);

export type SessionInput = z.infer<typeof SessionInputSchema>;

export interface ExportedFile {
  filename: string;
  mimeType: 'application/json' | 'text/csv';
  content: string;
}

export type SessionResult =
  | { action: 'list'; success: true; count: number; sessions: SessionSummary[] }
  | { action: 'load'; success: true; session: AssessmentSession }
  | { action: 'delete'; success: boolean; sessionId: string; message: string }
  | { action: 'export'; success: true; export: ExportedFile }
  | { action: 'backup'; success: true; file: string };

/**
 * Handle session management requests
 */
export function handleSession(
  args: Record<string, unknown>,
  services: Services
): SessionResult {
  const input = SessionInputSchema.parse(args);
  const { storage } = services;

  switch (input.action) {
    case 'list': {
      const sessions = storage
        .listSessions()
        .filter((summary) => input.status === undefined || summary.status === input.status)
        .slice(0, input.limit);
      return { action: 'list', success: true, count: sessions.length, sessions };
    }

    case 'load':
      return { action: 'load', success: true, session: requireSession(storage, input.sessionId) };

    case 'delete': {
      const deleted = storage.deleteSession(input.sessionId);
      logger.info('Session delete requested', { deleted, target: input.sessionId });
      return {
        action: 'delete',
        success: deleted,
        sessionId: input.sessionId,
        message: deleted ? 'Session deleted' : 'Session not found or could not be deleted',
      };
    }

    case 'export':
      return {
        action: 'export',
        success: true,
        export: exportSession(requireSession(storage, input.sessionId), input.format, input.csvType, services),
      };

    case 'backup': {
      const root = services.config.backupDir;
      const directory = input.directory === undefined ? root : resolveWithinRoot(root, input.directory);
      const file = storage.backup(directory);
      if (file === null) {
        throw new StorageError('backup could not be written', { directory });
      }
      return { action: 'backup', success: true, file };
    }
  }
}

function exportSession(
  session: AssessmentSession,
  format: 'json' | 'csv',
  csvType: 'responses' | 'scores',
  services: Services
): ExportedFile {
  const { questionBank } = services;
  const exportedAt = new Date().toISOString();

  if (format === 'json') {
    const scores = computeScores(questionBank.questions, questionBank.organizer, session.responses);
    return {
      filename: `assessment_${session.id}.json`,
      mimeType: 'application/json',
      content: exportJson(session, scores, exportedAt),
    };
  }

  if (csvType === 'scores') {
    const scores = computeScores(questionBank.questions, questionBank.organizer, session.responses);
    return {
      filename: `scores_${session.id}.csv`,
      mimeType: 'text/csv',
      content: scoresToCsv(scores),
    };
  }

  return {
    filename: `responses_${session.id}.csv`,
    mimeType: 'text/csv',
    content: responsesToCsv(session, questionBank.questions, exportedAt),
  };
}
