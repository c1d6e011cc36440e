import { useState, useEffect, useRef, useCallback } from 'react';
import { api, getScreenshotUrl, type LogLine, type LogLineLevel, type StepResult } from '../apiClient';
import { useTheme } from '../context/ThemeContext';
import { getPanelStyles, buttonStyles, badgeStyle } from './panelStyles';

const POLL_INTERVAL = 2000;
const MAX_LINES = 500;

const LEVEL_COLORS: Record<LogLineLevel, { light: string; dark: string }> = {
  info: { light: '#1f2937', dark: '#d1d5db' },
  success: { light: '#166534', dark: '#4ade80' },
  warning: { light: '#92400e', dark: '#fbbf24' },
  error: { light: '#dc2626', dark: '#f87171' },
};

function formatTime(timestamp: string): string {
  return new Date(timestamp).toLocaleTimeString();
}

function LogsView() {
  const { darkMode, toast } = useTheme();
  const styles = getPanelStyles(darkMode);
  const [lines, setLines] = useState<LogLine[]>([]);
  const [results, setResults] = useState<StepResult[]>([]);
  const [autoScroll, setAutoScroll] = useState(true);
  const [runs, setRuns] = useState<string[]>([]);
  const [selectedRun, setSelectedRun] = useState('');
  const [runLog, setRunLog] = useState<string | null>(null);
  const [pollError, setPollError] = useState<string | null>(null);
  const lastSeq = useRef(0);
  const logRef = useRef<HTMLDivElement>(null);

  const poll = useCallback(async () => {
    try {
      const data = await api.getLogs(lastSeq.current);
      if (data.lines.length > 0) {
        lastSeq.current = data.lines[data.lines.length - 1].seq;
        setLines((prev) => [...prev, ...data.lines].slice(-MAX_LINES));
      }
      setResults(data.results);
      setPollError(null);
    } catch (err) {
      setPollError(err instanceof Error ? err.message : 'Failed to load log');
    }
  }, []);

  useEffect(() => {
    void poll();
    const interval = setInterval(() => void poll(), POLL_INTERVAL);
    return () => clearInterval(interval);
  }, [poll]);

  useEffect(() => {
    api.getRuns()
      .then(setRuns)
      .catch((err: unknown) => toast.error(err instanceof Error ? err.message : 'Failed to load run history'));
  }, [toast]);

  useEffect(() => {
    if (autoScroll && logRef.current) {
      logRef.current.scrollTop = logRef.current.scrollHeight;
    }
  }, [lines, autoScroll]);

  useEffect(() => {
    if (!selectedRun) {
      setRunLog(null);
      return;
    }
    api.getRunLog(selectedRun)
      .then(setRunLog)
      .catch((err: unknown) => {
        setRunLog(null);
        toast.error(err instanceof Error ? err.message : 'Failed to load run log');
      });
  }, [selectedRun, toast]);

  async function clearLogs() {
    try {
      await api.clearLogs();
      setLines([]);
      toast.info('Log cleared');
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Failed to clear log');
    }
  }

  return (
    <div style={styles.container}>
      <h2 style={styles.title}>Logs</h2>

      <div style={styles.section}>
        <div style={{ ...styles.sectionTitle, display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
          <span>
            Live log
            {pollError && <span style={{ ...styles.hint, marginLeft: '0.75rem' }}>{pollError}</span>}
          </span>
          <div style={{ display: 'flex', gap: '0.75rem', alignItems: 'center', fontWeight: 400, fontSize: '0.85rem' }}>
            <label>
              <input type="checkbox" checked={autoScroll} onChange={(e) => setAutoScroll(e.target.checked)} />
              {' '}Auto-scroll
            </label>
            <button style={buttonStyles.secondary} onClick={() => void clearLogs()}>
              Clear
            </button>
          </div>
        </div>
        <div
          ref={logRef}
          style={{
            fontFamily: 'monospace',
            fontSize: '0.8rem',
            background: darkMode ? '#0f0f1a' : '#f9fafb',
            padding: '0.75rem',
            borderRadius: '4px',
            height: '320px',
            overflowY: 'auto',
          }}
        >
          {lines.length === 0 ? (
            <div style={styles.hint}>No log lines yet.</div>
          ) : (
            lines.map((line) => (
              <div key={line.seq} style={{ color: LEVEL_COLORS[line.level][darkMode ? 'dark' : 'light'] }}>
                [{formatTime(line.timestamp)}] {line.message}
              </div>
            ))
          )}
        </div>
      </div>

      <div style={styles.section}>
        <div style={styles.sectionTitle}>Step results ({results.length})</div>
        {results.length === 0 ? (
          <div style={styles.empty}>No results for the current run.</div>
        ) : (
          <table style={styles.table}>
            <thead>
              <tr>
                <th style={styles.th}>Time</th>
                <th style={styles.th}>Profile</th>
                <th style={styles.th}>Round</th>
                <th style={styles.th}>Step</th>
                <th style={styles.th}>Outcome</th>
                <th style={styles.th}>Detail</th>
              </tr>
            </thead>
            <tbody>
              {results.map((result, i) => (
                <tr key={`${result.timestamp}-${i}`}>
                  <td style={styles.td}>{formatTime(result.timestamp)}</td>
                  <td style={styles.td}>{result.profileName ?? '-'}</td>
                  <td style={styles.td}>{result.round || '-'}</td>
                  <td style={styles.td}>{result.stepName}</td>
                  <td style={styles.td}>
                    <span style={badgeStyle(result.outcome)}>{result.outcome}</span>
                  </td>
                  <td style={styles.td}>
                    {result.detail}
                    {result.screenshot && (
                      <>
                        {' '}
                        <a href={getScreenshotUrl(result.runId, result.screenshot)} target="_blank" rel="noreferrer">
                          screenshot
                        </a>
                      </>
                    )}
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </div>

      <div style={styles.section}>
        <div style={styles.sectionTitle}>Run history</div>
        <select
          style={{ ...styles.input, minWidth: '320px' }}
          value={selectedRun}
          onChange={(e) => setSelectedRun(e.target.value)}
        >
          <option value="">Select a run...</option>
          {runs.map((runId) => (
            <option key={runId} value={runId}>{runId}</option>
          ))}
        </select>
        {runLog !== null && (
          <pre
            style={{
              marginTop: '1rem',
              fontSize: '0.8rem',
              whiteSpace: 'pre-wrap',
              maxHeight: '400px',
              overflowY: 'auto',
              background: darkMode ? '#0f0f1a' : '#f9fafb',
              padding: '0.75rem',
              borderRadius: '4px',
            }}
          >
            {runLog || '(empty)'}
          </pre>
        )}
      </div>
    </div>
  );
}

export default LogsView;
