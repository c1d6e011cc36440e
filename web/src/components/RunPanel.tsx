import { useState, useEffect, useCallback } from 'react';
import {
  api,
  isRunActive,
  subscribeToRunEvents,
  type Profile,
  type ProgressEvent,
  type Status,
} from '../apiClient';
import { useTheme } from '../context/ThemeContext';
import { getPanelStyles, buttonStyles, badgeStyle } from './panelStyles';

interface Props {
  status: Status | null;
  onRefresh: () => Promise<void>;
}

const MAX_ROUNDS_FALLBACK = 100;

function RunPanel({ status, onRefresh }: Props) {
  const { darkMode, toast } = useTheme();
  const styles = getPanelStyles(darkMode);
  const [profiles, setProfiles] = useState<Profile[]>([]);
  const [selected, setSelected] = useState<Set<string>>(new Set());
  const [rounds, setRounds] = useState(1);
  const [maxRounds, setMaxRounds] = useState(MAX_ROUNDS_FALLBACK);
  const [busy, setBusy] = useState(false);
  const [delayUntil, setDelayUntil] = useState<number | null>(null);
  const [connected, setConnected] = useState(false);

  const run = status?.run;
  const active = isRunActive(run?.status);

  useEffect(() => {
    api.getProfiles()
      .then(setProfiles)
      .catch((err: unknown) => toast.error(err instanceof Error ? err.message : 'Failed to load profiles'));
    api.getRunnerOptions()
      .then((options) => setMaxRounds(options.maxRounds))
      .catch(() => setMaxRounds(MAX_ROUNDS_FALLBACK));
  }, [toast, status?.profileCount]);

  const handleEvent = useCallback(
    (event: ProgressEvent) => {
      switch (event.type) {
        case 'profile-complete':
          // Finished profiles drop out of the selection for the next run
          setSelected((prev) => {
            const next = new Set(prev);
            next.delete(event.profileId);
            return next;
          });
          break;
        case 'delay':
          setDelayUntil(Date.now() + event.delayMs);
          break;
        case 'profile-start':
          setDelayUntil(null);
          break;
        case 'run-end':
          setDelayUntil(null);
          if (event.status === 'completed') {
            toast.success(`Run completed: ${event.summary.completed} done, ${event.summary.failed} failed`);
          } else {
            toast.warning(event.error ? `Run stopped: ${event.error}` : 'Run stopped');
          }
          break;
        default:
          break;
      }

      if (event.type !== 'log') {
        void onRefresh();
      }
    },
    [onRefresh, toast]
  );

  useEffect(() => {
    return subscribeToRunEvents({
      onEvent: handleEvent,
      onConnected: () => setConnected(true),
      onDisconnected: () => setConnected(false),
    });
  }, [handleEvent]);

  function toggle(id: string) {
    setSelected((prev) => {
      const next = new Set(prev);
      if (next.has(id)) next.delete(id);
      else next.add(id);
      return next;
    });
  }

  function toggleAll() {
    setSelected((prev) => (prev.size === profiles.length ? new Set() : new Set(profiles.map((p) => p.id))));
  }

  async function control(action: () => Promise<unknown>, success: string) {
    setBusy(true);
    try {
      await action();
      toast.info(success);
      await onRefresh();
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Request failed');
    } finally {
      setBusy(false);
    }
  }

  // Keep the selection order of the profile list
  const selectedIds = profiles.filter((p) => selected.has(p.id)).map((p) => p.id);
  const canStart = !active && !busy && selectedIds.length > 0 && rounds >= 1 && rounds <= maxRounds;
  const delaySeconds = delayUntil ? Math.max(0, Math.ceil((delayUntil - Date.now()) / 1000)) : null;

  return (
    <div style={styles.container}>
      <h2 style={styles.title}>Run</h2>

      <div style={styles.section}>
        <div style={{ ...styles.sectionTitle, display: 'flex', justifyContent: 'space-between' }}>
          <span>Select profiles ({selectedIds.length}/{profiles.length})</span>
          {profiles.length > 0 && (
            <button style={buttonStyles.secondary} onClick={toggleAll} disabled={active}>
              {selected.size === profiles.length ? 'Select none' : 'Select all'}
            </button>
          )}
        </div>

        {profiles.length === 0 ? (
          <div style={styles.empty}>No profiles yet. Add some on the Profiles tab.</div>
        ) : (
          <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fill, minmax(220px, 1fr))', gap: '0.5rem' }}>
            {profiles.map((profile) => (
              <label key={profile.id} style={{ display: 'flex', gap: '0.5rem', alignItems: 'center' }}>
                <input
                  type="checkbox"
                  checked={selected.has(profile.id)}
                  disabled={active}
                  onChange={() => toggle(profile.id)}
                />
                {profile.name}
              </label>
            ))}
          </div>
        )}

        <div style={{ ...styles.field, marginTop: '1rem', maxWidth: '200px' }}>
          <label style={styles.label}>Rounds</label>
          <input
            type="number"
            min={1}
            max={maxRounds}
            style={styles.input}
            value={rounds}
            disabled={active}
            onChange={(e) => setRounds(parseInt(e.target.value, 10) || 1)}
          />
        </div>

        <div style={styles.buttons}>
          <button
            style={{ ...buttonStyles.primary, ...(canStart ? {} : buttonStyles.disabled) }}
            disabled={!canStart}
            onClick={() => void control(() => api.startRun(selectedIds, rounds), 'Run started')}
          >
            Start
          </button>
          <button
            style={{ ...buttonStyles.danger, ...(run?.status === 'running' ? {} : buttonStyles.disabled) }}
            disabled={run?.status !== 'running' || busy}
            onClick={() => void control(api.stopRun, 'Stop requested')}
          >
            {run?.status === 'stopping' ? 'Stopping...' : 'Stop'}
          </button>
          <button
            style={{ ...buttonStyles.secondary, ...(active ? buttonStyles.disabled : {}) }}
            disabled={active || busy}
            onClick={() => void control(api.resetRun, 'Run state cleared')}
          >
            Reset
          </button>
          <span style={{ ...styles.hint, alignSelf: 'center' }}>
            {connected ? 'Live' : 'Reconnecting...'}
          </span>
        </div>
      </div>

      {run && run.queue.length > 0 && (
        <div style={styles.section}>
          <div style={{ ...styles.sectionTitle, display: 'flex', gap: '1rem', alignItems: 'center' }}>
            <span>Queue</span>
            <span style={badgeStyle(run.status)}>{run.status}</span>
            <span style={styles.hint}>
              {run.summary.completed} completed · {run.summary.failed} failed · {run.summary.skipped} skipped
              {run.summary.stopped > 0 && ` · ${run.summary.stopped} stopped`}
            </span>
            {delaySeconds !== null && active && (
              <span style={styles.hint}>Next profile in ~{delaySeconds}s</span>
            )}
          </div>

          {run.error && (
            <div style={{ background: '#fee2e2', color: '#dc2626', padding: '0.75rem', borderRadius: '4px', marginBottom: '1rem' }}>
              {run.error}
            </div>
          )}

          <table style={styles.table}>
            <thead>
              <tr>
                <th style={styles.th}>#</th>
                <th style={styles.th}>Profile</th>
                <th style={styles.th}>Round</th>
                <th style={styles.th}>Status</th>
                <th style={styles.th}>Failed steps</th>
              </tr>
            </thead>
            <tbody>
              {run.queue.map((item) => (
                <tr
                  key={item.index}
                  style={item.index === run.currentIndex ? { background: darkMode ? '#2a2a10' : '#fffbeb' } : undefined}
                >
                  <td style={styles.td}>{item.index + 1}</td>
                  <td style={styles.td}>
                    {item.profileName}
                    {item.index === run.currentIndex && run.currentStep && (
                      <span style={{ ...styles.hint, marginLeft: '0.5rem' }}>{run.currentStep}</span>
                    )}
                  </td>
                  <td style={styles.td}>{item.round}/{run.rounds}</td>
                  <td style={styles.td}>
                    <span style={badgeStyle(item.status)}>{item.status}</span>
                  </td>
                  <td style={styles.td}>{item.failedSteps}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      )}

      {status && (
        <div style={styles.section}>
          <div style={styles.sectionTitle}>Steps per profile</div>
          <ol style={{ margin: 0, paddingLeft: '1.25rem' }}>
            {status.steps.map((step) => (
              <li key={step.name}>
                {step.label} <span style={styles.hint}>({step.name})</span>
              </li>
            ))}
          </ol>
        </div>
      )}
    </div>
  );
}

export default RunPanel;
