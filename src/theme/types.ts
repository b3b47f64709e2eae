export interface ThemeColors {
  background: {
    app: string
    panel: string
    section: string
    header: string
    footer: string
    input: string
    hover: string
    selected: string
    reportPreview: string
  }
  text: {
    primary: string
    secondary: string
    muted: string
    inverse: string
    link: string
    linkHover: string
    heading: string
    headerSubtle: string
  }
  border: {
    main: string
    subtle: string
    focus: string
  }
  severity: {
    high: string
    highBg: string
    highText: string
    medium: string
    mediumBg: string
    mediumText: string
  }
  button: {
    primary: string
    primaryHover: string
    primaryText: string
    secondary: string
    secondaryHover: string
    secondaryText: string
  }
  accent: {
    indigo: string
    indigoBg: string
    indigoText: string
    green: string
    greenBg: string
    greenText: string
    orange: string
    orangeText: string
  }
  tooltip: {
    background: string
    border: string
  }
  scrollbar: {
    track: string
    thumb: string
    thumbHover: string
  }
}

export interface Theme {
  colors: ThemeColors
}
