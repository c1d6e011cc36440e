import { useState, useEffect, useCallback } from 'react';
import { api, type Profile } from '../apiClient';
import { useTheme } from '../context/ThemeContext';
import { getPanelStyles, buttonStyles } from './panelStyles';

interface Props {
  onChange: () => Promise<void>;
  runActive: boolean;
}

interface Draft {
  name: string;
  path: string;
}

const EMPTY_DRAFT: Draft = { name: '', path: '' };

function ProfilesPanel({ onChange, runActive }: Props) {
  const { darkMode, toast } = useTheme();
  const styles = getPanelStyles(darkMode);
  const [profiles, setProfiles] = useState<Profile[]>([]);
  const [loading, setLoading] = useState(true);
  const [draft, setDraft] = useState<Draft>(EMPTY_DRAFT);
  const [editingId, setEditingId] = useState<string | null>(null);
  const [editDraft, setEditDraft] = useState<Draft>(EMPTY_DRAFT);
  const [saving, setSaving] = useState(false);

  const loadProfiles = useCallback(async () => {
    try {
      setProfiles(await api.getProfiles());
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Failed to load profiles');
    } finally {
      setLoading(false);
    }
  }, [toast]);

  useEffect(() => {
    void loadProfiles();
  }, [loadProfiles]);

  async function addProfile() {
    setSaving(true);
    try {
      const profile = await api.addProfile(draft.name, draft.path);
      toast.success(`Added ${profile.name}`);
      setDraft(EMPTY_DRAFT);
      await loadProfiles();
      await onChange();
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Failed to add profile');
    } finally {
      setSaving(false);
    }
  }

  async function saveEdit(id: string) {
    setSaving(true);
    try {
      await api.updateProfile(id, editDraft);
      setEditingId(null);
      await loadProfiles();
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Failed to update profile');
    } finally {
      setSaving(false);
    }
  }

  async function deleteProfile(profile: Profile) {
    if (!window.confirm(`Delete profile "${profile.name}"? The browser data on disk is not touched.`)) {
      return;
    }
    try {
      await api.deleteProfile(profile.id);
      toast.info(`Deleted ${profile.name}`);
      await loadProfiles();
      await onChange();
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Failed to delete profile');
    }
  }

  function startEdit(profile: Profile) {
    setEditingId(profile.id);
    setEditDraft({ name: profile.name, path: profile.path });
  }

  const canAdd = draft.name.trim() !== '' && draft.path.trim() !== '' && !saving;

  return (
    <div style={styles.container}>
      <h2 style={styles.title}>Profiles</h2>

      <div style={styles.section}>
        <div style={styles.sectionTitle}>Add profile</div>
        <div style={styles.field}>
          <label style={styles.label}>Name</label>
          <input
            style={styles.input}
            value={draft.name}
            placeholder="Work account"
            onChange={(e) => setDraft({ ...draft, name: e.target.value })}
          />
        </div>
        <div style={styles.field}>
          <label style={styles.label}>Browser profile path</label>
          <input
            style={styles.input}
            value={draft.path}
            placeholder="C:\Users\me\AppData\Local\Microsoft\Edge\User Data\Profile 1"
            onChange={(e) => setDraft({ ...draft, path: e.target.value })}
          />
          <span style={styles.hint}>
            A browser user-data directory, or a profile folder inside one (Default, Profile 1, ...)
          </span>
        </div>
        <button
          style={{ ...buttonStyles.primary, ...(canAdd ? {} : buttonStyles.disabled) }}
          disabled={!canAdd}
          onClick={() => void addProfile()}
        >
          {saving ? 'Saving...' : 'Add profile'}
        </button>
      </div>

      <div style={styles.section}>
        <div style={styles.sectionTitle}>Saved profiles ({profiles.length})</div>
        {loading ? (
          <div style={styles.empty}>Loading profiles...</div>
        ) : profiles.length === 0 ? (
          <div style={styles.empty}>No profiles yet. Add one above.</div>
        ) : (
          <table style={styles.table}>
            <thead>
              <tr>
                <th style={styles.th}>Name</th>
                <th style={styles.th}>Path</th>
                <th style={styles.th}>Added</th>
                <th style={styles.th} />
              </tr>
            </thead>
            <tbody>
              {profiles.map((profile) =>
                editingId === profile.id ? (
                  <tr key={profile.id}>
                    <td style={styles.td}>
                      <input
                        style={styles.input}
                        value={editDraft.name}
                        onChange={(e) => setEditDraft({ ...editDraft, name: e.target.value })}
                      />
                    </td>
                    <td style={styles.td}>
                      <input
                        style={{ ...styles.input, width: '100%' }}
                        value={editDraft.path}
                        onChange={(e) => setEditDraft({ ...editDraft, path: e.target.value })}
                      />
                    </td>
                    <td style={styles.td} />
                    <td style={{ ...styles.td, whiteSpace: 'nowrap' }}>
                      <button
                        style={buttonStyles.primary}
                        disabled={saving}
                        onClick={() => void saveEdit(profile.id)}
                      >
                        Save
                      </button>{' '}
                      <button style={buttonStyles.secondary} onClick={() => setEditingId(null)}>
                        Cancel
                      </button>
                    </td>
                  </tr>
                ) : (
                  <tr key={profile.id}>
                    <td style={styles.td}>{profile.name}</td>
                    <td style={{ ...styles.td, fontFamily: 'monospace', fontSize: '0.8rem' }} title={profile.path}>
                      {profile.path}
                    </td>
                    <td style={styles.td}>{new Date(profile.createdAt).toLocaleDateString()}</td>
                    <td style={{ ...styles.td, whiteSpace: 'nowrap' }}>
                      <button style={buttonStyles.secondary} onClick={() => startEdit(profile)}>
                        Edit
                      </button>{' '}
                      <button
                        style={{ ...buttonStyles.danger, ...(runActive ? buttonStyles.disabled : {}) }}
                        disabled={runActive}
                        title={runActive ? 'Stop the run before deleting profiles' : undefined}
                        onClick={() => void deleteProfile(profile)}
                      >
                        Delete
                      </button>
                    </td>
                  </tr>
                )
              )}
            </tbody>
          </table>
        )}
      </div>
    </div>
  );
}

export default ProfilesPanel;
