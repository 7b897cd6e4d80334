import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import type { Release } from '../../github/types.ts'
import type { ReleaseSelection } from '../../core/releases.ts'
import { Select, type SelectOption } from '../components/index.ts'

type Flow = ReleaseSelection['kind']

const FLOW_OPTIONS: SelectOption<Flow>[] = [
  { label: 'Changes since the previous release', value: 'since_previous' },
  { label: 'Changes between two releases', value: 'between' },
]

function releaseOptions(releases: Release[]): SelectOption[] {
  return releases.map((release) => ({
    label: release.publishedAt ? `${release.tagName} (${release.publishedAt.slice(0, 10)})` : release.tagName,
    value: release.tagName,
  }))
}

type ReleaseScreenProps = {
  releases: Release[]
  keyword: string
  isFocused: boolean
  onSubmit: (selection: ReleaseSelection) => void
  onBack: () => void
}

export function ReleaseScreen({ releases, keyword, isFocused, onSubmit, onBack }: ReleaseScreenProps) {
  const [flow, setFlow] = useState<Flow | null>(null)
  const [newer, setNewer] = useState<string | null>(null)
  const options = releaseOptions(releases)

  useInput(
    (_input, key) => {
      if (!key.escape) return
      if (newer !== null) {
        setNewer(null)
      } else if (flow !== null) {
        setFlow(null)
      } else {
        onBack()
      }
    },
    { isActive: isFocused },
  )

  const submit = (selection: ReleaseSelection) => {
    setFlow(null)
    setNewer(null)
    onSubmit(selection)
  }

  const renderPicker = (): React.ReactNode => {
    if (flow === null) {
      return <Select key="flow" label="Which changelog?" options={FLOW_OPTIONS} isFocused={isFocused} onSelect={setFlow} />
    }
    if (flow === 'since_previous') {
      return (
        <Select
          key="release"
          label="Which release?"
          options={options}
          isFocused={isFocused}
          onSelect={(release) => submit({ kind: 'since_previous', release })}
        />
      )
    }
    if (newer === null) {
      return <Select key="newer" label="Newer release" options={options} isFocused={isFocused} onSelect={setNewer} />
    }
    return (
      <Select
        key="older"
        label={`Older release (compared with ${newer})`}
        options={options}
        isFocused={isFocused}
        onSelect={(older) => submit({ kind: 'between', newer, older })}
      />
    )
  }

  return (
    <Box flexDirection="column">
      <Box marginBottom={1}>
        <Text dimColor>
          {releases.length} release{releases.length === 1 ? '' : 's'} mention "{keyword}", newest first. [ESC] back
        </Text>
      </Box>
      {renderPicker()}
    </Box>
  )
}
