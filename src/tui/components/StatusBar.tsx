// tui/components/StatusBar.tsx — Top bar: mode, list size, slot pool

import React from 'react';
import { Box, Text } from 'ink';
import { colors, modeBadge } from '../theme';

interface Props {
  loading: boolean;
  listSize: number;
  count: number;
  maxVisible: number;
  slotsCreated: number;
  scrapSize: number;
}

const StatusBar: React.FC<Props> = ({ loading, listSize, count, maxVisible, slotsCreated, scrapSize }) => (
  <Box borderStyle="single" borderColor="cyan" paddingX={1}>
    <Text>{colors.header(' Recents ')}</Text>
    <Text> {modeBadge(loading)}</Text>
    <Text> {colors.muted('│')} tasks: {colors.value(String(listSize))}</Text>
    <Text> {colors.muted('│')} shown: {colors.value(`${count}/${maxVisible}`)}</Text>
    <Text> {colors.muted('│')} slots: {colors.value(String(slotsCreated))} {colors.muted(`(${scrapSize} scrap)`)}</Text>
  </Box>
);

export default StatusBar;
