export const BACKUPS_ROOT = "backups"

const pad = (value: number): string => String(value).padStart(2, "0")

// FORMAT THEOREM: forall d, l: backupDirectoryName(d, l) matches /^\d{8}_\d{6}_l$/
// PURITY: CORE
// INVARIANT: fields are read in local time and zero padded
// COMPLEXITY: O(1)/O(1)
export const backupDirectoryName = (date: Date, label: string): string => {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${day}_${time}_${label}`
}
