import { runInAction } from 'mobx'
import { useLocalObservable } from 'mobx-react-lite'

/**
 * MobX-backed local state. Use in place of useState when the value is read
 * inside an autorun or by an observer that should re-render on change.
 *
 * Returns a [value, setter] tuple; the setter runs in an action.
 */
export function useObservableState<T>(initial: T): [T, (value: T) => void] {
  const state = useLocalObservable(() => ({
    value: initial,
  }))
  const setter = (value: T): void => {
    runInAction(() => {
      state.value = value
    })
  }
  return [state.value, setter]
}
