import { Box, Text } from "ink";
import BigText from "ink-big-text";
import type React from "react";

interface HeaderProps {
  subtitle?: string;
}

export const Header: React.FC<HeaderProps> = ({
  subtitle = "Send images and commands to the smART Sketcher 2.0 projector",
}) => {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <BigText text="Sketcher" font="tiny" />
      <Text color="white">{subtitle}</Text>
    </Box>
  );
};
