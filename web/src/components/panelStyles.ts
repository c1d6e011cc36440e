import type { CSSProperties } from 'react';

export const getPanelStyles = (darkMode: boolean) => ({
  container: {
    maxWidth: '1000px',
  },
  title: {
    fontSize: '1.5rem',
    marginBottom: '1.5rem',
    color: darkMode ? '#e0e0e0' : '#1a1a2e',
  },
  section: {
    background: darkMode ? '#1a1a2e' : '#fff',
    borderRadius: '8px',
    padding: '1.5rem',
    marginBottom: '1.5rem',
    boxShadow: '0 2px 4px rgba(0,0,0,0.1)',
  },
  sectionTitle: {
    fontSize: '1.1rem',
    fontWeight: 600,
    marginBottom: '1rem',
  },
  field: {
    display: 'flex',
    flexDirection: 'column' as const,
    gap: '0.5rem',
    marginBottom: '1rem',
  },
  label: {
    fontWeight: 500,
    fontSize: '0.9rem',
  },
  input: {
    padding: '0.5rem',
    borderRadius: '4px',
    border: `1px solid ${darkMode ? '#333' : '#ddd'}`,
    background: darkMode ? '#0f0f1a' : '#fff',
    color: 'inherit',
    fontSize: '0.9rem',
  },
  hint: {
    fontSize: '0.8rem',
    color: darkMode ? '#9ca3af' : '#666',
  },
  buttons: {
    display: 'flex',
    gap: '0.5rem',
    marginTop: '1rem',
  },
  table: {
    width: '100%',
    borderCollapse: 'collapse' as const,
    fontSize: '0.9rem',
  },
  th: {
    textAlign: 'left' as const,
    padding: '0.5rem',
    borderBottom: `1px solid ${darkMode ? '#333' : '#eee'}`,
    fontWeight: 600,
  },
  td: {
    padding: '0.5rem',
    borderBottom: `1px solid ${darkMode ? '#222' : '#f3f3f3'}`,
    verticalAlign: 'top' as const,
  },
  empty: {
    textAlign: 'center' as const,
    padding: '2rem',
    color: darkMode ? '#9ca3af' : '#666',
  },
});

const buttonBase: CSSProperties = {
  padding: '0.5rem 1rem',
  borderRadius: '4px',
  border: 'none',
  cursor: 'pointer',
  fontSize: '0.9rem',
  fontWeight: 500,
};

export const buttonStyles = {
  primary: { ...buttonBase, background: '#1a1a2e', color: '#fff' },
  secondary: { ...buttonBase, background: '#e5e5e5', color: '#333' },
  danger: { ...buttonBase, background: '#dc2626', color: '#fff' },
  disabled: { opacity: 0.6, cursor: 'not-allowed' },
} satisfies Record<string, CSSProperties>;

const BADGE_COLORS: Record<string, { background: string; color: string }> = {
  success: { background: '#dcfce7', color: '#166534' },
  completed: { background: '#dcfce7', color: '#166534' },
  failure: { background: '#fee2e2', color: '#dc2626' },
  failed: { background: '#fee2e2', color: '#dc2626' },
  running: { background: '#fef3c7', color: '#92400e' },
  stopping: { background: '#fef3c7', color: '#92400e' },
  stopped: { background: '#fde2e2', color: '#9f1239' },
  skipped: { background: '#e5e7eb', color: '#374151' },
  pending: { background: '#dbeafe', color: '#1e40af' },
};

export function badgeStyle(status: string): CSSProperties {
  const colors = BADGE_COLORS[status] ?? { background: '#e5e7eb', color: '#374151' };
  return {
    padding: '0.15rem 0.5rem',
    borderRadius: '4px',
    fontSize: '0.75rem',
    fontWeight: 500,
    textTransform: 'uppercase',
    ...colors,
  };
}
