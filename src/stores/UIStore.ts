import { makeAutoObservable } from 'mobx'

export type ToastType = 'error' | 'success' | 'info'

/**
 * Store for transient UI state (toast, glossary modal)
 */
export class UIStore {
  toastMessage: string = ''
  toastType: ToastType = 'error'
  toastVisible: boolean = false

  glossaryOpen: boolean = false
  glossaryTargetTerm: string | null = null

  private _toastTimer: ReturnType<typeof setTimeout> | null = null

  constructor() {
    makeAutoObservable<this, '_toastTimer'>(this, {
      _toastTimer: false,
    })
  }

  openGlossary = (termId?: string): void => {
    this.glossaryTargetTerm = termId ?? null
    this.glossaryOpen = true
  }

  closeGlossary = (): void => {
    this.glossaryOpen = false
    this.glossaryTargetTerm = null
  }

  showToast = (message: string, type: ToastType = 'error', durationMs = 5000): void => {
    if (this._toastTimer) clearTimeout(this._toastTimer)
    this.toastMessage = message
    this.toastType = type
    this.toastVisible = true
    this._toastTimer = setTimeout(() => {
      this.dismissToast()
    }, durationMs)
  }

  dismissToast = (): void => {
    if (this._toastTimer) {
      clearTimeout(this._toastTimer)
      this._toastTimer = null
    }
    this.toastVisible = false
  }

  reset = (): void => {
    this.dismissToast()
    this.closeGlossary()
  }
}
