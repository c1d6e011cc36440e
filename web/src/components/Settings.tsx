import { useState, useEffect } from 'react';
import { api, type RunnerOptions } from '../apiClient';
import { useTheme } from '../context/ThemeContext';
import { getPanelStyles, buttonStyles } from './panelStyles';

type NumericOption = 'interProfileDelayMs' | 'stepTimeoutMs' | 'sessionTimeoutMs' | 'maxRounds';

const NUMERIC_FIELDS: Array<{ key: NumericOption; label: string; hint: string }> = [
  { key: 'interProfileDelayMs', label: 'Delay between profiles (ms)', hint: 'Pause after each profile before the next one opens' },
  { key: 'stepTimeoutMs', label: 'Step timeout (ms)', hint: 'A step still running after this long counts as failed' },
  { key: 'sessionTimeoutMs', label: 'Session timeout (ms)', hint: 'Upper bound for opening the browser' },
  { key: 'maxRounds', label: 'Maximum rounds', hint: 'Largest round count a run may request' },
];

function Settings() {
  const { darkMode, toast } = useTheme();
  const styles = getPanelStyles(darkMode);
  const [options, setOptions] = useState<RunnerOptions | null>(null);
  const [saving, setSaving] = useState(false);
  const [cleanupDays, setCleanupDays] = useState(7);

  useEffect(() => {
    api.getRunnerOptions()
      .then(setOptions)
      .catch((err: unknown) => toast.error(err instanceof Error ? err.message : 'Failed to load settings'));
  }, [toast]);

  async function save() {
    if (!options) return;
    setSaving(true);
    try {
      setOptions(await api.updateRunnerOptions(options));
      toast.success('Settings saved');
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Failed to save settings');
    } finally {
      setSaving(false);
    }
  }

  async function cleanup() {
    try {
      const result = await api.cleanup(cleanupDays);
      toast.info(`Removed ${result.logsDeleted} run(s) and ${result.screenshotsDeleted} screenshot(s)`);
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Cleanup failed');
    }
  }

  if (!options) {
    return <div style={styles.empty}>Loading settings...</div>;
  }

  return (
    <div style={styles.container}>
      <h2 style={styles.title}>Settings</h2>

      <div style={styles.section}>
        <div style={styles.sectionTitle}>Runner</div>
        {NUMERIC_FIELDS.map(({ key, label, hint }) => (
          <div key={key} style={styles.field}>
            <label style={styles.label}>{label}</label>
            <input
              type="number"
              min={key === 'maxRounds' ? 1 : 0}
              style={{ ...styles.input, maxWidth: '200px' }}
              value={options[key]}
              onChange={(e) => setOptions({ ...options, [key]: Number(e.target.value) })}
            />
            <span style={styles.hint}>{hint}</span>
          </div>
        ))}
        <label style={{ display: 'flex', gap: '0.5rem', alignItems: 'center' }}>
          <input
            type="checkbox"
            checked={options.screenshotOnFailure}
            onChange={(e) => setOptions({ ...options, screenshotOnFailure: e.target.checked })}
          />
          Save a screenshot when a step fails
        </label>
        <div style={styles.buttons}>
          <button style={buttonStyles.primary} disabled={saving} onClick={() => void save()}>
            {saving ? 'Saving...' : 'Save'}
          </button>
        </div>
        <p style={styles.hint}>
          Browser and login-check settings live in config/config.json and apply after a restart.
        </p>
      </div>

      <div style={styles.section}>
        <div style={styles.sectionTitle}>Storage</div>
        <div style={styles.field}>
          <label style={styles.label}>Delete run logs and screenshots older than (days)</label>
          <input
            type="number"
            min={0}
            style={{ ...styles.input, maxWidth: '200px' }}
            value={cleanupDays}
            onChange={(e) => setCleanupDays(Number(e.target.value))}
          />
        </div>
        <button style={buttonStyles.danger} onClick={() => void cleanup()}>
          Clean up
        </button>
      </div>
    </div>
  );
}

export default Settings;
