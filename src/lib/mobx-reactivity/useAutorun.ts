import { autorun } from 'mobx'
import { useEffect, useRef } from 'react'

/**
 * Runs a MobX autorun for as long as the component is mounted.
 *
 * The autorun always calls the latest `fn` through a ref, so it never sees a
 * stale closure. It re-runs whenever an observable read inside `fn` changes.
 */
export function useAutorun(fn: () => void): void {
  const fnRef = useRef(fn)
  fnRef.current = fn
  useEffect(() => autorun(() => fnRef.current()), [])
}
