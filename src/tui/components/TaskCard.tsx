// tui/components/TaskCard.tsx — One slot: icon, label and thumbnail rows

import React from 'react';
import { Box, Text } from 'ink';
import { colors, paintIcon, truncate } from '../theme';
import { LOADING_LABEL } from '../../task-item-view';
import type { ItemContent } from '../../task-item-view';

interface Props {
  slotId: number;
  position: number;
  content: ItemContent;
  selected: boolean;
}

const THUMBNAIL_ROWS = 3;
const WIDTH = 26;

const TaskCard: React.FC<Props> = ({ slotId, position, content, selected }) => {
  const label = content.loading ? colors.muted(LOADING_LABEL) : truncate(content.label, WIDTH - 4);
  const rows = Array.from({ length: THUMBNAIL_ROWS }, (_, i) => content.thumbnail[i] ?? '');

  return (
    <Box flexDirection="column" borderStyle={selected ? 'double' : 'single'} borderColor={selected ? 'cyan' : 'gray'} paddingX={1} width={WIDTH + 4}>
      <Text>
        {paintIcon(content.icon)} {selected ? colors.bold(label) : label}
      </Text>
      {rows.map((row, i) => (
        <Text key={i}>{colors.dim(truncate(row, WIDTH) || ' ')}</Text>
      ))}
      <Text>{colors.muted(`#${position} slot ${slotId}`)}</Text>
    </Box>
  );
};

export default TaskCard;
