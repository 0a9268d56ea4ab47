// tui/cli.ts — Render the recents TUI with Ink

import React from 'react';
import { render } from 'ink';
import App from './App';
import { createRecents } from '../recents';
import type { RecentsConfig } from '../config';

export async function runTui(config: RecentsConfig): Promise<void> {
  const recents = createRecents(config);
  recents.host.layout();

  const { waitUntilExit } = render(React.createElement(App, { recents }));
  try {
    await waitUntilExit();
  } finally {
    recents.dispose();
  }
}
