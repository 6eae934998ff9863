import type { Resource, TextResourceContents } from '@modelcontextprotocol/sdk/types.js';

import type { Services } from '../services/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { isSafeId } from '../utils/id.js';
import { logger } from '../utils/logger.js';

const SCHEME = 'assessment:';
const URI_FORMAT = 'assessment://questions or assessment://sessions/{id}';

/**
 * List the questionnaire and every stored session as MCP resources.
 *
 * URIs follow `assessment://{type}[/{id}]`. A storage failure leaves the
 * session entries out rather than hiding the questionnaire.
 *
 * @example
 * ```typescript
 * const resources = registerResources(services);
 * // [
 * //   { uri: 'assessment://questions', name: 'Questionnaire', ... },
 * //   { uri: 'assessment://sessions/session-456', name: 'Ada Rossi (Example University)', ... }
 * // ]
 * ```
 */
export function registerResources(services: Services): Resource[] {
  const { questionBank, storage } = services;
  const resources: Resource[] = [
    {
      uri: 'assessment://questions',
      name: 'Questionnaire',
      description: `${questionBank.questions.length} questions in ${questionBank.organizer.categories().length} categories (${questionBank.source})`,
      mimeType: 'application/json',
    },
  ];

  try {
    for (const summary of storage.listSessions()) {
      resources.push({
        uri: `assessment://sessions/${summary.id}`,
        name: `${summary.name} (${summary.organization})`,
        description: `Assessment session (${summary.status}, ${summary.answered} answered)`,
        mimeType: 'application/json',
      });
    }
  } catch (listError) {
    logger.error('Failed to list sessions for resources', listError);
  }

  return resources;
}

/**
 * Read a resource by URI.
 *
 * The first segment is the URI host (`assessment://sessions/x` has host
 * "sessions"); trailing slashes are ignored and extra segments rejected.
 *
 * @throws {ValidationError} If the URI is malformed or names an unknown type
 * @throws {NotFoundError} If the session does not exist
 */
export function handleResourceRead(
  uri: string,
  services: Services
): { contents: TextResourceContents[] } {
  let url: URL;
  try {
    url = new URL(uri);
  } catch (parseError) {
    throw new ValidationError(`Invalid URI format: ${uri}. Expected ${URI_FORMAT}`, [
      { path: 'uri', message: parseError instanceof Error ? parseError.message : String(parseError) },
    ]);
  }

  if (url.protocol !== SCHEME) {
    throw new ValidationError(`Invalid protocol: ${url.protocol}. Expected "${SCHEME}". URI: ${uri}`);
  }

  const segments = [url.host, ...url.pathname.split('/')].filter((segment) => segment.length > 0);
  const [type, id, ...rest] = segments;

  if (rest.length > 0) {
    throw new ValidationError(`Invalid URI: too many path segments. Expected ${URI_FORMAT}. URI: ${uri}`);
  }

  const json = (data: unknown): { contents: TextResourceContents[] } => ({
    contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(data, null, 2) }],
  });

  switch (type) {
    case 'questions': {
      if (id !== undefined) {
        throw new ValidationError(`Invalid URI: questions takes no ID. URI: ${uri}`);
      }
      const { questionBank } = services;
      return json({
        source: questionBank.source,
        categories: questionBank.organizer.organized(),
      });
    }

    case 'sessions': {
      if (id === undefined || !isSafeId(id)) {
        throw new ValidationError(`Invalid URI: missing or malformed session ID. Expected ${URI_FORMAT}. URI: ${uri}`);
      }
      const session = services.storage.loadSession(id);
      if (!session) {
        throw new NotFoundError('Session', id);
      }
      return json(session);
    }

    default:
      throw new ValidationError(`Unknown resource type: ${String(type)}. Valid types are: questions, sessions`);
  }
}
