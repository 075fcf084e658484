// src/routes/oauthRoutes.ts
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

export const OAUTH_CALLBACK_PATH = '/oauth2callback';

const CallbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().optional(),
  error: z.string().optional(),
});

export type OAuthCallbackOptions = {
  /** CSRF state sent with the consent URL */
  expectedState: string;
  onCode: (code: string) => void;
  onDenied: (reason: string) => void;
};

/**
 * Render the page the browser lands on after the consent screen
 */
function renderCallbackPage(success: boolean, title: string, subtitle: string): string {
  const color = success ? '#155724' : '#721c24';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${title}</title>
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; text-align: center; padding: 60px;">
  <h1 style="color: ${color};">${title}</h1>
  <p>${subtitle}</p>
</body>
</html>`;
}

/**
 * Register the loopback OAuth callback.
 * Google redirects the browser here with `?code=...&state=...` once the user consents.
 */
export async function oauthRoutes(fastify: FastifyInstance, options: OAuthCallbackOptions): Promise<void> {
  fastify.get(OAUTH_CALLBACK_PATH, async (request, reply) => {
    const query = CallbackQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'Invalid callback parameters' });
    }

    const { code, state, error } = query.data;

    if (state !== options.expectedState) {
      fastify.log.warn('CSRF state mismatch on OAuth callback');
      return reply.code(400).send({ error: 'Invalid state parameter' });
    }

    if (error) {
      fastify.log.warn({ error }, 'OAuth consent denied');
      options.onDenied(error);
      return reply
        .code(400)
        .type('text/html')
        .send(renderCallbackPage(false, 'Authorization denied', 'Return to the terminal for details.'));
    }

    if (!code) {
      return reply.code(400).send({ error: 'Missing authorization code' });
    }

    options.onCode(code);
    return reply
      .type('text/html')
      .send(renderCallbackPage(true, 'Authorization complete', 'You can close this tab and return to the terminal.'));
  });
}
