export { useAutorun } from './useAutorun'
export { useObservableState } from './useObservableState'
