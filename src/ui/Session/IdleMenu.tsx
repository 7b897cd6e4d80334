import React from 'react'
import { Select, type SelectOption } from '../components/index.ts'

export type IdleAction = 'next' | 'repository' | 'exit'

const IDLE_OPTIONS: SelectOption<IdleAction>[] = [
  { label: 'Summarize another range', value: 'next' },
  { label: 'Switch repository', value: 'repository' },
  { label: 'Exit', value: 'exit' },
]

type IdleMenuProps = {
  isFocused: boolean
  onSelect: (action: IdleAction) => void
}

export function IdleMenu({ isFocused, onSelect }: IdleMenuProps) {
  return <Select label="What next?" options={IDLE_OPTIONS} isFocused={isFocused} onSelect={onSelect} />
}
