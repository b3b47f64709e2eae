import { Global, css, useTheme } from '@emotion/react'

export function GlobalStyles() {
  const theme = useTheme()

  return (
    <Global
      styles={css`
        *,
        *::before,
        *::after {
          box-sizing: border-box;
        }

        body {
          margin: 0;
          font-family: system-ui, -apple-system, 'Segoe UI', Roboto, sans-serif;
          color: ${theme.colors.text.primary};
          background-color: ${theme.colors.background.app};
        }

        h1, h2, h3, p {
          margin: 0;
        }

        ::-webkit-scrollbar {
          width: 8px;
          height: 8px;
        }
        ::-webkit-scrollbar-track {
          background: ${theme.colors.scrollbar.track};
        }
        ::-webkit-scrollbar-thumb {
          background: ${theme.colors.scrollbar.thumb};
          border-radius: 4px;
        }
        ::-webkit-scrollbar-thumb:hover {
          background: ${theme.colors.scrollbar.thumbHover};
        }

        @keyframes attention-pulse {
          0% {
            box-shadow: 0 0 0 0 rgba(14, 165, 233, 0.6);
          }
          40% {
            box-shadow: 0 0 0 8px rgba(14, 165, 233, 0);
          }
          100% {
            box-shadow: 0 0 0 0 rgba(14, 165, 233, 0);
          }
        }

        .attention-pulse {
          animation: attention-pulse 0.7s ease-out;
        }
      `}
    />
  )
}
