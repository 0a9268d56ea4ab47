// tui/components/EventLog.tsx — Tail of the event bus

import React from 'react';
import { Box, Text } from 'ink';
import { colors, formatArgs, formatTimestamp, severityIcon } from '../theme';
import type { EventEntry } from '../../types';

interface Props {
  events: EventEntry[];
  totalEvents: number;
}

const VISIBLE_ROWS = 6;

const EventLog: React.FC<Props> = ({ events, totalEvents }) => {
  const visible = events.slice(-VISIBLE_ROWS);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
      <Text>{colors.header('EVENTS')} {colors.muted(`(${totalEvents} total)`)}</Text>
      {visible.length === 0 && <Text>{colors.muted('  (no events)')}</Text>}
      {visible.map((e) => (
        <Text key={e.id}>
          {colors.muted(formatTimestamp(e.createdAt))} {severityIcon[e.severity]} {e.type} {colors.muted(formatArgs(e.args))}
        </Text>
      ))}
    </Box>
  );
};

export default EventLog;
