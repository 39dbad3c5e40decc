import { Component, type ReactNode, type ErrorInfo } from 'react';

interface Props {
  children: ReactNode;
  /** Shown in the log tag and the fallback heading. */
  label?: string;
  fallback?: ReactNode;
}

interface State {
  error: Error | null;
}

export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error(`[ErrorBoundary${this.props.label ? `:${this.props.label}` : ''}]`, error, info.componentStack);
  }

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;
    return this.props.fallback || (
      <div className="p-4 m-4 bg-red-50 dark:bg-red-900/20 border border-red-200 dark:border-red-800 rounded-lg">
        <h3 className="text-red-800 dark:text-red-200 font-semibold text-sm mb-1">
          {this.props.label ? `Could not render ${this.props.label}` : 'Something went wrong'}
        </h3>
        <p className="text-red-700 dark:text-red-300 text-xs font-mono">{error.message || 'Unknown error'}</p>
        <button
          onClick={() => this.setState({ error: null })}
          className="mt-2 px-3 py-1 text-xs bg-red-600 text-white rounded hover:bg-red-700"
        >
          Retry
        </button>
      </div>
    );
  }
}
