// tui/App.tsx — Root layout with keyboard handling for the recents window

import React, { useState, useCallback } from 'react';
import { Box, useInput, useApp } from 'ink';
import StatusBar from './components/StatusBar';
import RecentsPanel from './components/RecentsPanel';
import EventLog from './components/EventLog';
import HelpBar from './components/HelpBar';
import { useRecents } from './hooks/useRecents';
import type { Recents } from '../recents';

interface Props {
  recents: Recents;
}

const App: React.FC<Props> = ({ recents }) => {
  const { exit } = useApp();
  const data = useRecents(recents);
  const [selected, setSelected] = useState(0);

  const selectedHolder = useCallback(() => {
    return recents.host.visibleSlots().find((s) => s.position === selected)?.holder;
  }, [recents, selected]);

  const move = useCallback((delta: number) => {
    const next = Math.max(0, Math.min(recents.binder.count() - 1, selected + delta));
    const { host } = recents;
    const slots = host.visibleSlots();
    const first = slots.length > 0 ? slots[0].position : 0;
    const last = slots.length > 0 ? slots[slots.length - 1].position : 0;
    // Keep the selection inside the attached window
    if (next < first) host.scrollBy(next - first);
    if (next > last) host.scrollBy(next - last);
    setSelected(next);
  }, [recents, selected]);

  useInput((input, key) => {
    if (input === 'q') {
      exit();
      return;
    }
    if (key.upArrow || key.leftArrow) {
      move(-1);
      return;
    }
    if (key.downArrow || key.rightArrow) {
      move(1);
      return;
    }
    if (key.return) {
      const holder = selectedHolder();
      if (holder) holder.itemView.activate();
      return;
    }
    if (input === 'd') {
      const holder = selectedHolder();
      if (holder) recents.controller.dismiss(holder);
      setSelected((s) => Math.max(0, Math.min(s, recents.binder.count() - 1)));
      return;
    }
    if (input === 'c') {
      recents.controller.clearAll();
      setSelected(0);
      return;
    }
    if (input === 'l') {
      recents.setLoadingMode(!recents.binder.loadingMode);
      return;
    }
    if (input === 'r') {
      recents.reload();
    }
  });

  return (
    <Box flexDirection="column" width="100%">
      <StatusBar
        loading={data.loading}
        listSize={data.listSize}
        count={data.count}
        maxVisible={recents.binder.maxVisible}
        slotsCreated={data.slotsCreated}
        scrapSize={data.scrapSize}
      />
      <RecentsPanel slots={data.slots} count={data.count} selectedPosition={selected} />
      <EventLog events={data.events} totalEvents={data.totalEvents} />
      <HelpBar loading={data.loading} />
    </Box>
  );
};

export default App;
