import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import type { Commit } from '../../github/types.ts'
import type { SummaryMode } from '../../core/summaries.ts'
import { formatCommitLog } from '../../github/client.ts'
import { Select, TextInput, type SelectOption } from '../components/index.ts'

const MODE_OPTIONS: SelectOption<SummaryMode>[] = [
  { label: 'Summarize each commit', value: 'each' },
  { label: 'One summary for the whole range', value: 'combined' },
  { label: 'Each commit, then a changelog', value: 'changelog' },
]

type RangeScreenProps = {
  commits: Commit[]
  isFocused: boolean
  onSubmit: (range: string, mode: SummaryMode) => void
  onReleases: () => void
  onBack: () => void
}

export function RangeScreen({ commits, isFocused, onSubmit, onReleases, onBack }: RangeScreenProps) {
  const [value, setValue] = useState('')
  const [range, setRange] = useState<string | null>(null)

  useInput(
    (_input, key) => {
      if (key.tab && range === null) {
        onReleases()
        return
      }
      if (!key.escape) return
      if (range !== null) {
        setRange(null)
      } else {
        onBack()
      }
    },
    { isActive: isFocused },
  )

  return (
    <Box flexDirection="column">
      <Box flexDirection="column" marginBottom={1}>
        <Text bold>Recent commits</Text>
        {commits.length === 0 ? (
          <Text dimColor>No commits on the default branch.</Text>
        ) : (
          <Text>{formatCommitLog(commits, { numbered: true, includeDate: true })}</Text>
        )}
      </Box>

      {range === null ? (
        <TextInput
          label="Which commits?"
          value={value}
          onChange={setValue}
          onSubmit={(input) => setRange(input)}
          placeholder="1-5"
          hint="3 · 1-5 · abc1234 · abc1234..def5678   [TAB] releases  [ESC] change repository"
          focus={isFocused}
        />
      ) : (
        <Select
          label={`Summarize ${range} how?`}
          options={MODE_OPTIONS}
          isFocused={isFocused}
          onSelect={(mode) => {
            setRange(null)
            setValue('')
            onSubmit(range, mode)
          }}
        />
      )}
    </Box>
  )
}
