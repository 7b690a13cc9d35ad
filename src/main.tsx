import { StrictMode, Component } from 'react'
import type { ErrorInfo, ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App'
import { EngineProvider } from './components/EngineProvider'
import { ConversionEngine } from './engine/ConversionEngine'
import { BrowserKeyValueStore } from './engine/persistence/KeyValueStores'

interface ErrorBoundaryState { error: Error | null }

class ErrorBoundary extends Component<{ children: ReactNode }, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null }
  static getDerivedStateFromError(error: Error) { return { error } }
  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('Render error', error, info.componentStack)
  }
  render() {
    if (this.state.error) {
      return (
        <div style={{ padding: '2rem 1rem', maxWidth: 600, margin: '0 auto' }}>
          <h2 style={{ color: '#ff8a80', marginBottom: '0.75rem' }}>Something went wrong</h2>
          <p style={{ color: '#b2dfdb', marginBottom: '1rem' }}>
            The calculator hit an error. Reload the page to try again.
          </p>
          <button className="icon-btn" onClick={() => window.location.reload()}>
            Reload
          </button>
          <pre style={{ marginTop: '1.5rem', whiteSpace: 'pre-wrap', fontSize: '0.75rem' }}>
            {this.state.error.message}
          </pre>
        </div>
      )
    }
    return this.props.children
  }
}

const rootElement = document.getElementById('root')
if (!rootElement) throw new Error('Missing #root element')

const engine = new ConversionEngine({ store: new BrowserKeyValueStore(window.localStorage) })

createRoot(rootElement).render(
  <StrictMode>
    <ErrorBoundary>
      <EngineProvider engine={engine}>
        <App />
      </EngineProvider>
    </ErrorBoundary>
  </StrictMode>,
)
