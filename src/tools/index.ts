import type { Tool, TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/index.js';
import { logger } from '../utils/logger.js';
import {
  classifyError,
  createErrorResponse,
  AssessmentError,
  ErrorCode,
} from '../utils/errors.js';

import { startTool, handleStart } from './start.js';
import { questionsTool, handleQuestions } from './questions.js';
import { answerTool, handleAnswer } from './answer.js';
import { completeTool, handleComplete } from './complete.js';
import { resultsTool, handleResults } from './results.js';
import { sessionTool, handleSession } from './session.js';
import { healthTool, handleHealth } from './health.js';

/**
 * Register all MCP tools
 *
 * - assessment_start: Register a respondent and open a session
 * - assessment_questions: Browse the questionnaire
 * - assessment_answer: Record answers and comments
 * - assessment_complete: Close a session
 * - assessment_results: Scores, insights, narratives
 * - assessment_session: list, load, delete, export, backup
 * - assessment_health: Health check
 */
export function registerTools(): Tool[] {
  return [
    startTool,
    questionsTool,
    answerTool,
    completeTool,
    resultsTool,
    sessionTool,
    healthTool,
  ];
}

/**
 * Validate that args is a proper object (not null, not array).
 */
function validateArgs(args: unknown): args is Record<string, unknown> {
  return (
    args !== null &&
    typeof args === 'object' &&
    !Array.isArray(args)
  );
}

function textResult(body: unknown): { content: TextContent[] } {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(body, null, 2),
      },
    ],
  };
}

/**
 * Handle tool calls with input validation, request tracking, and structured error responses.
 * Failures come back as an error body; nothing is thrown to the transport.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  services: Services
): Promise<{ content: TextContent[] }> {
  const sessionId =
    validateArgs(args) && typeof args['sessionId'] === 'string' ? args['sessionId'] : undefined;

  return logger.withRequestContext(
    { toolName: name, sessionId },
    async () => {
      const requestId = logger.getRequestId();

      try {
        if (!validateArgs(args)) {
          logger.warn('Invalid arguments received', undefined, {
            argType: typeof args,
            isNull: args === null,
            isArray: Array.isArray(args),
          });
          throw new AssessmentError(
            'Arguments must be a non-null object',
            ErrorCode.INVALID_ARGUMENTS,
            { details: { received: Array.isArray(args) ? 'array' : typeof args } }
          );
        }

        logger.debug('Tool call started', undefined, {
          argKeys: Object.keys(args),
        });

        let result: unknown;

        switch (name) {
          case 'assessment_start':
            result = handleStart(args, services);
            break;

          case 'assessment_questions':
            result = handleQuestions(args, services);
            break;

          case 'assessment_answer':
            result = handleAnswer(args, services);
            break;

          case 'assessment_complete':
            result = handleComplete(args, services);
            break;

          case 'assessment_results':
            result = await handleResults(args, services);
            break;

          case 'assessment_session':
            result = handleSession(args, services);
            break;

          case 'assessment_health':
            result = handleHealth(args, services);
            break;

          default: {
            const available = registerTools().map((tool) => tool.name);
            logger.warn('Unknown tool requested', undefined, { tool: name });
            throw new AssessmentError(
              `Unknown tool: ${name}. Available: ${available.join(', ')}`,
              ErrorCode.UNKNOWN_TOOL,
              { details: { tool: name, available } }
            );
          }
        }

        logger.debug('Tool call completed', undefined, { elapsedMs: logger.getElapsedMs() });

        return textResult(result);
      } catch (error) {
        const classified = classifyError(error);

        logger.error('Tool call failed', error, {
          code: classified.code,
          httpStatus: classified.httpStatus,
          isRetryable: classified.isRetryable,
          elapsedMs: logger.getElapsedMs(),
        });

        return textResult(createErrorResponse(error, requestId));
      }
    }
  );
}
