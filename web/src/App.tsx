import { useState, useEffect, useCallback } from 'react';
import { api, isRunActive, type Status, type RunStatus } from './apiClient';
import { ThemeProvider, useTheme } from './context/ThemeContext';
import { ToastContainer } from './components/Toast';
import ProfilesPanel from './components/ProfilesPanel';
import RunPanel from './components/RunPanel';
import LogsView from './components/LogsView';
import Settings from './components/Settings';

type Page = 'profiles' | 'run' | 'logs' | 'settings';

const PAGES: Array<{ id: Page; label: string }> = [
  { id: 'profiles', label: 'Profiles' },
  { id: 'run', label: 'Run' },
  { id: 'logs', label: 'Logs' },
  { id: 'settings', label: 'Settings' },
];

const STATUS_COLORS: Record<RunStatus, string> = {
  idle: '#9ca3af',
  running: '#4ade80',
  stopping: '#f59e0b',
  stopped: '#f87171',
  completed: '#60a5fa',
};

const getStyles = (darkMode: boolean) => ({
  app: {
    minHeight: '100vh',
    display: 'flex',
    flexDirection: 'column' as const,
    background: darkMode ? '#0f0f1a' : '#f5f5f5',
    color: darkMode ? '#e0e0e0' : '#1a1a2e',
    transition: 'background 0.3s, color 0.3s',
  },
  header: {
    background: '#1a1a2e',
    color: '#fff',
    padding: '1rem 2rem',
    display: 'flex',
    justifyContent: 'space-between',
    alignItems: 'center',
  },
  title: {
    margin: 0,
    fontSize: '1.5rem',
    fontWeight: 600,
  },
  statusBar: {
    display: 'flex',
    gap: '1rem',
    fontSize: '0.85rem',
    alignItems: 'center',
  },
  statusItem: {
    display: 'flex',
    alignItems: 'center',
    gap: '0.5rem',
  },
  statusDot: (color: string) => ({
    width: '8px',
    height: '8px',
    borderRadius: '50%',
    background: color,
  }),
  nav: {
    background: darkMode ? '#12122a' : '#16213e',
    padding: '0 2rem',
    display: 'flex',
    justifyContent: 'space-between',
  },
  navButton: (active: boolean) => ({
    background: active ? (darkMode ? '#1f1f4a' : '#0f3460') : 'transparent',
    color: '#fff',
    border: 'none',
    padding: '0.75rem 1.5rem',
    cursor: 'pointer',
    fontSize: '0.9rem',
    borderBottom: active ? '2px solid #4ade80' : '2px solid transparent',
    transition: 'all 0.2s',
  }),
  darkModeToggle: {
    background: 'transparent',
    border: '1px solid rgba(255,255,255,0.3)',
    color: '#fff',
    padding: '0.5rem 1rem',
    borderRadius: '4px',
    cursor: 'pointer',
    fontSize: '0.85rem',
    margin: '0.5rem 0',
  },
  main: {
    flex: 1,
    padding: '2rem',
  },
  error: {
    background: darkMode ? '#450a0a' : '#fee2e2',
    color: darkMode ? '#fca5a5' : '#dc2626',
    padding: '1rem',
    borderRadius: '4px',
    marginBottom: '1rem',
    display: 'flex',
    justifyContent: 'space-between',
    alignItems: 'center',
  },
});

function AppContent() {
  const { darkMode, toggleDarkMode, toasts, removeToast } = useTheme();
  const [page, setPage] = useState<Page>('run');
  const [status, setStatus] = useState<Status | null>(null);
  const [error, setError] = useState<string | null>(null);

  const styles = getStyles(darkMode);

  const loadStatus = useCallback(async () => {
    try {
      const data = await api.getStatus();
      setStatus(data);
      setError(null);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to load status');
    }
  }, []);

  useEffect(() => {
    void loadStatus();
    const interval = setInterval(() => void loadStatus(), 5000);
    return () => clearInterval(interval);
  }, [loadStatus]);

  const run = status?.run;
  const current = run && run.currentIndex !== null ? run.queue[run.currentIndex] : undefined;

  return (
    <div style={styles.app}>
      <ToastContainer toasts={toasts} onRemove={removeToast} darkMode={darkMode} />

      <header style={styles.header}>
        <h1 style={styles.title}>Profile Runner</h1>
        <div style={styles.statusBar}>
          <div style={styles.statusItem}>
            <div style={styles.statusDot(STATUS_COLORS[run?.status ?? 'idle'])} />
            <span>{run ? run.status.toUpperCase() : 'OFFLINE'}</span>
          </div>
          {current && (
            <span>
              {current.profileName} ({(run?.currentIndex ?? 0) + 1}/{run?.queue.length})
              {run?.currentStep && ` · ${run.currentStep}`}
            </span>
          )}
          <span>{status?.profileCount ?? 0} profile{status?.profileCount === 1 ? '' : 's'}</span>
        </div>
      </header>

      <nav style={styles.nav}>
        <div>
          {PAGES.map((p) => (
            <button key={p.id} style={styles.navButton(page === p.id)} onClick={() => setPage(p.id)}>
              {p.label}
            </button>
          ))}
        </div>
        <button style={styles.darkModeToggle} onClick={toggleDarkMode}>
          {darkMode ? '☀️ Light' : '🌙 Dark'}
        </button>
      </nav>

      <main style={styles.main}>
        {error && (
          <div style={styles.error}>
            <span>Error: {error}</span>
            <button
              style={{
                background: 'none',
                border: 'none',
                cursor: 'pointer',
                fontSize: '1.2rem',
                color: 'inherit',
              }}
              onClick={() => setError(null)}
            >
              ×
            </button>
          </div>
        )}

        {page === 'profiles' && <ProfilesPanel onChange={loadStatus} runActive={isRunActive(run?.status)} />}
        {page === 'run' && <RunPanel status={status} onRefresh={loadStatus} />}
        {page === 'logs' && <LogsView />}
        {page === 'settings' && <Settings />}
      </main>
    </div>
  );
}

function App() {
  return (
    <ThemeProvider>
      <AppContent />
    </ThemeProvider>
  );
}

export default App;
