import type { ErrorVerbosity, Outcome, RequestScope } from '../types.js';

export const MESSAGES = {
  emptyQuery: 'Please provide the title of the movie or TV show.',
  rejected: "I couldn't add your request. Please check the details and try again.",
  transportError: 'An error occurred while processing your request. Please try again later.',
} as const;

function formatSubmitted(title: string, scope: RequestScope): string {
  switch (scope) {
    case 'all-seasons':
      return `I have successfully added all seasons of '${title}' to your requests.`;
    case 'latest-season':
      return `I have successfully added the latest season of '${title}' to your requests.`;
    case 'unscoped':
      return `I have successfully added '${title}' to your requests.`;
  }
}

export function formatOutcome(outcome: Outcome, verbosity: ErrorVerbosity = 'generic'): string {
  switch (outcome.kind) {
    case 'empty-query':
      return MESSAGES.emptyQuery;
    case 'not-found':
      return `I'm sorry, but I couldn't find any media matching '${outcome.query}'.`;
    case 'submitted':
      return formatSubmitted(outcome.title, outcome.scope);
    case 'submission-rejected':
      return MESSAGES.rejected;
    case 'transport-error':
      if (verbosity === 'detailed') {
        const detail = outcome.error.upstreamMessage().trim().replace(/\.+$/, '');
        return `An error occurred while processing your request: ${detail}. Please try again later.`;
      }
      return MESSAGES.transportError;
  }
}
