import React from 'react'
import { Box, Text } from 'ink'
import SelectInput from 'ink-select-input'

export type SelectOption<V extends string = string> = {
  label: string
  value: V
}

type SelectProps<V extends string> = {
  label: string
  options: SelectOption<V>[]
  onSelect: (value: V) => void
  initialIndex?: number
  /** Stop reacting to keys while an action is running */
  isFocused?: boolean
}

export function Select<V extends string>({
  label,
  options,
  onSelect,
  initialIndex,
  isFocused = true,
}: SelectProps<V>) {
  return (
    <Box flexDirection="column">
      <Box marginBottom={1}>
        <Text color="cyan" bold>
          {label}
        </Text>
      </Box>
      <SelectInput
        items={options}
        onSelect={(item) => onSelect(item.value)}
        initialIndex={initialIndex}
        isFocused={isFocused}
      />
    </Box>
  )
}
