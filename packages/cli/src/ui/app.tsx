import React from 'react';
import { render } from 'ink';

/**
 * Mounts an Ink app and resolves once it unmounts. The app calls
 * `useApp().exit()` when its loop has finished or failed.
 */
export async function renderApp(element: React.ReactElement): Promise<void> {
  const instance = render(element, { exitOnCtrlC: true });
  await instance.waitUntilExit();
}
