import { useEffect, useState } from 'react'
import { ACTIVITY_CSV_FILE, resolveDataPath } from '../../config'
import { EMPTY_TABLE, loadActivityTableOrEmpty, type LoadDiagnostic } from './loadActivities'
import type { ActivityTable } from './types'

export interface ActivityTableResult {
  loading: boolean
  error: string | null
  table: ActivityTable
  diagnostic: LoadDiagnostic | null
}

export function useActivityTable(path: string = resolveDataPath(ACTIVITY_CSV_FILE)): ActivityTableResult {
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)
  const [table, setTable] = useState<ActivityTable>(EMPTY_TABLE)
  const [diagnostic, setDiagnostic] = useState<LoadDiagnostic | null>(null)

  useEffect(() => {
    let cancelled = false

    const load = async () => {
      try {
        const result = await loadActivityTableOrEmpty(path)
        if (cancelled) return

        setTable(result.table)
        setDiagnostic(result.diagnostic)
        setError(null)
        setLoading(false)
      } catch (loadError) {
        if (cancelled) return
        console.error('Failed to load activity table:', loadError)
        setTable(EMPTY_TABLE)
        setDiagnostic(null)
        setError(loadError instanceof Error ? loadError.message : String(loadError))
        setLoading(false)
      }
    }

    setLoading(true)
    void load()

    return () => {
      cancelled = true
    }
  }, [path])

  return { loading, error, table, diagnostic }
}
