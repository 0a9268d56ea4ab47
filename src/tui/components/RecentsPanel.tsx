// tui/components/RecentsPanel.tsx — Attached slots in position order

import React from 'react';
import { Box, Text } from 'ink';
import TaskCard from './TaskCard';
import { colors } from '../theme';
import type { SlotSnapshot } from '../hooks/useRecents';

interface Props {
  slots: SlotSnapshot[];
  count: number;
  selectedPosition: number;
}

const RecentsPanel: React.FC<Props> = ({ slots, count, selectedPosition }) => {
  const first = slots.length > 0 ? slots[0].position + 1 : 0;
  const last = slots.length > 0 ? slots[slots.length - 1].position + 1 : 0;

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="cyan" paddingX={1}>
      <Text>{colors.header('RECENT TASKS')} {colors.muted(`(${first}-${last} of ${count})`)}</Text>
      {slots.length === 0 && <Text>{colors.muted('  (no recent tasks)')}</Text>}
      <Box flexDirection="row">
        {slots.map((s) => (
          <TaskCard
            key={s.slotId}
            slotId={s.slotId}
            position={s.position}
            content={s.content}
            selected={s.position === selectedPosition}
          />
        ))}
      </Box>
    </Box>
  );
};

export default RecentsPanel;
