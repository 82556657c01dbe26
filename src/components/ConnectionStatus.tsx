import { Box, Text } from "ink";
import type React from "react";

export interface ConnectionStep {
  id: string;
  label: string;
  status: "pending" | "active" | "complete" | "error";
  error?: string;
}

interface ConnectionStatusProps {
  steps: ConnectionStep[];
}

const StepLine: React.FC<{ step: ConnectionStep }> = ({ step }) => {
  switch (step.status) {
    case "complete":
      return <Text color="green">✓ {step.label}</Text>;
    case "active":
      return (
        <Text color="cyan">
          › {step.label}
          <Text color="dim">...</Text>
        </Text>
      );
    case "error":
      return (
        <Text color="red">
          ✗ {step.label} failed
          {step.error && <Text color="dim"> ({step.error})</Text>}
        </Text>
      );
    case "pending":
      return <Text color="gray">· {step.label}</Text>;
  }
};

/**
 * Checklist of a multi-step operation
 */
export const ConnectionStatus: React.FC<ConnectionStatusProps> = ({
  steps,
}) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      {steps.map((step) => (
        <StepLine key={step.id} step={step} />
      ))}
    </Box>
  );
};
