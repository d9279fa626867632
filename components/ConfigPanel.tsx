import React from 'react';
import { CredentialName, Credentials } from '../types';

interface ConfigPanelProps {
  credentials: Credentials;
  onChange: (name: CredentialName, value: string) => void;
}

const FIELDS: { name: CredentialName; label: string; missing: string }[] = [
  { name: 'geminiApiKey', label: 'Gemini API Key', missing: 'Analysis is disabled until a Gemini API key is provided.' },
  { name: 'hfToken', label: 'Hugging Face Token', missing: 'Concept images are disabled until a Hugging Face token is provided.' }
];

export const ConfigPanel: React.FC<ConfigPanelProps> = ({ credentials, onChange }) => (
  <aside className="bg-white rounded-2xl p-6 shadow-sm border border-slate-100 space-y-5">
    <h2 className="font-bold text-slate-800">Configuration</h2>
    {FIELDS.map(({ name, label, missing }) => (
      <div key={name}>
        <label htmlFor={name} className="block text-sm font-semibold text-slate-700 mb-1">
          {label}
        </label>
        <input
          id={name}
          type="password"
          autoComplete="off"
          value={credentials[name] ?? ''}
          onChange={(e) => onChange(name, e.target.value)}
          className="w-full p-2 border border-slate-300 rounded-lg focus:ring-2 focus:ring-emerald-500 outline-none text-sm"
        />
        {!credentials[name] && (
          <p role="alert" className="mt-1 text-xs text-amber-700">{missing}</p>
        )}
      </div>
    ))}
  </aside>
);
