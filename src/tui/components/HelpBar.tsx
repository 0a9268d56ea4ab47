// tui/components/HelpBar.tsx — Keyboard shortcuts bar

import React from 'react';
import { Box, Text } from 'ink';
import { colors } from '../theme';

interface Props {
  loading: boolean;
}

const HelpBar: React.FC<Props> = ({ loading }) => {
  const sep = colors.muted('│');
  const modeHint = loading ? 'live' : 'placeholders';

  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1}>
      <Text>
        {colors.info('Up/Down')} select {sep} {colors.info('Enter')} launch {sep} {colors.info('d')} dismiss {sep} {colors.info('c')} clear {sep} {colors.info('l')} {modeHint} {sep} {colors.info('r')} refresh {sep} {colors.info('q')} quit
      </Text>
    </Box>
  );
};

export default HelpBar;
