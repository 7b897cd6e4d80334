import React from 'react'
import { Box, Text } from 'ink'
import { Select, type SelectOption } from '../components/index.ts'

const EXIT_VALUE = '__exit__'

type RepositoryScreenProps = {
  names: string[]
  invalid: Record<string, string>
  isFocused: boolean
  onSelect: (name: string) => void
  onExit: () => void
}

export function RepositoryScreen({ names, invalid, isFocused, onSelect, onExit }: RepositoryScreenProps) {
  const options: SelectOption[] = [
    ...names.map((name) => ({ label: name, value: name })),
    { label: 'Exit', value: EXIT_VALUE },
  ]
  const skipped = Object.entries(invalid)

  return (
    <Box flexDirection="column">
      {names.length === 0 && (
        <Box marginBottom={1}>
          <Text color="yellow">No repositories configured. Add entries under "repositories" in the config file.</Text>
        </Box>
      )}
      <Select
        label="Which repository?"
        options={options}
        isFocused={isFocused}
        onSelect={(value) => (value === EXIT_VALUE ? onExit() : onSelect(value))}
      />
      {skipped.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text dimColor>Skipped (misconfigured):</Text>
          {skipped.map(([name, reason]) => (
            <Text key={name} dimColor>
              {'  '}
              {name}: {reason}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  )
}
