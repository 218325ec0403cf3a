import { createApiClient } from './api-client';
import { createDomView } from './dom-view';
import { createSessionController } from './session-controller';

function start(): void {
  // Token-protected installs open the page as /?token=...
  const token = new URLSearchParams(window.location.search).get('token') ?? undefined;
  const view = createDomView();
  const controller = createSessionController({
    api: createApiClient({ token }),
    view,
    preferences: window.localStorage,
  });

  view.bind(controller.dispatch);
  window.addEventListener('beforeunload', () => controller.stop());
  controller.start().catch((error: unknown) => {
    view.showMessage('action', `Startup failed: ${error instanceof Error ? error.message : String(error)}`, true);
  });
}

document.addEventListener('DOMContentLoaded', start);
