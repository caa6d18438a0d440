/**
 * Verbose response echo, installed as the client's response observer.
 */

import type { Logger, ResponseEvent, ResponseObserver } from '@company-hierarchy/crm-client';

export function describeResponse(event: ResponseEvent): string[] {
  const { context } = event;
  const pretty = () => JSON.stringify(event.body, null, 2);

  switch (event.operation) {
    case 'listChildren':
      return [
        `\n[Verbose Mode] Fetching child companies with Client Parent Company ID: ${context.locationId}`,
        pretty(),
      ];
    case 'findParent':
      return [
        `\n[Verbose Mode] Searching for parent company with Client Company Location ID: ${context.locationId}`,
        pretty(),
      ];
    case 'renameParent':
      return [`\n[Verbose Mode] Updating company name to: ${context.name}`, pretty()];
    case 'createParent':
      return [`\n[Verbose Mode] Creating parent company: ${context.name}`, pretty()];
    case 'associate':
      return [
        `\n[Verbose Mode] Associating Child Company ${context.childId} to Parent Company ${context.parentId} (Labels: Parent & Child)`,
        `Response Status: ${event.status}`,
        `Response Text: ${event.detail}`,
      ];
  }
}

export function createVerboseObserver(logger: Logger = console): ResponseObserver {
  return (event) => {
    for (const line of describeResponse(event)) {
      logger.log(line);
    }
  };
}
