import React from 'react'
import { Box, Text } from 'ink'
import InkTextInput from 'ink-text-input'

type TextInputProps = {
  label: string
  value: string
  onChange: (value: string) => void
  onSubmit: (value: string) => void
  placeholder?: string
  /** Shown under the input, e.g. the accepted formats */
  hint?: string
  focus?: boolean
}

export function TextInput({
  label,
  value,
  onChange,
  onSubmit,
  placeholder,
  hint,
  focus = true,
}: TextInputProps) {
  const handleSubmit = (val: string) => {
    if (val.trim() === '') return
    onSubmit(val.trim())
  }

  return (
    <Box flexDirection="column">
      <Text color="cyan" bold>
        {label}
      </Text>
      <Box marginTop={1}>
        <Text color="gray">{'❯ '}</Text>
        <InkTextInput
          value={value}
          onChange={onChange}
          onSubmit={handleSubmit}
          placeholder={placeholder ?? ''}
          focus={focus}
        />
      </Box>
      {hint && (
        <Box marginTop={1}>
          <Text dimColor>{hint}</Text>
        </Box>
      )}
    </Box>
  )
}
