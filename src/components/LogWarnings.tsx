import React from "react";
import { Box, Text } from "ink";

export interface LogWarningsProps {
  warnings: string[];
}

export const LogWarnings: React.FC<LogWarningsProps> = ({ warnings }) => {
  if (warnings.length === 0) {
    return null;
  }

  return (
    <Box flexDirection="column" marginTop={1}>
      {warnings.map((warning, index) => (
        <Text key={index} color="yellow">
          ⚠ {warning}
        </Text>
      ))}
    </Box>
  );
};
