export { TextInput } from './TextInput.tsx'
export { Select } from './Select.tsx'
export type { SelectOption } from './Select.tsx'
export { StatusBar } from './StatusBar.tsx'
export { SummaryList } from './SummaryList.tsx'
export { DebugLog } from './DebugLog.tsx'
