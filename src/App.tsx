import { useState, useCallback } from 'react';
import { RouteExplorer } from './components/RouteExplorer';
import { describeLoadError } from './lib/data';

interface LoadingOverlayProps {
  progress: number;
}

function LoadingOverlay({ progress }: LoadingOverlayProps) {
  return (
    <div className="loading-overlay" role="status">
      <p className="loading-text">Loading routes and airports...</p>
      <div className="loading-progress">
        <div className="loading-progress-bar" style={{ width: `${progress}%` }} />
      </div>
      <p className="loading-percent">{progress.toFixed(0)}%</p>
    </div>
  );
}

interface LoadErrorScreenProps {
  error: Error;
}

/**
 * Shown instead of the explorer when the datasets could not be loaded.
 * The download hint appears only when the files are missing or unreachable.
 */
function LoadErrorScreen({ error }: LoadErrorScreenProps) {
  const { title, message, showDataHint } = describeLoadError(error);

  return (
    <div className="viewport error-screen" role="alert">
      <h1 className="error-title">{title}</h1>
      <p className="error-message">{message}</p>
      {showDataHint && (
        <p className="error-hint">
          Run <code>npm run data</code> to download the route datasets into <code>public/data</code>.
        </p>
      )}
      <button type="button" className="error-reload" onClick={() => window.location.reload()}>
        Reload
      </button>
    </div>
  );
}

function App() {
  const [progress, setProgress] = useState(0);
  const [loadError, setLoadError] = useState<Error | null>(null);

  const handleLoadProgress = useCallback((value: number) => {
    setProgress(value);
  }, []);

  const handleError = useCallback((err: Error) => {
    console.error('[App] Flight data failed to load:', err);
    setLoadError(err);
  }, []);

  if (loadError) {
    return <LoadErrorScreen error={loadError} />;
  }

  return (
    <div className="viewport">
      {progress < 100 && <LoadingOverlay progress={progress} />}
      <RouteExplorer onLoadProgress={handleLoadProgress} onError={handleError} />
    </div>
  );
}

export default App;
