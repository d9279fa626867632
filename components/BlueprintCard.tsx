import React from 'react';
import { DesignBlueprint } from '../types';

interface BlueprintCardProps {
  blueprint: DesignBlueprint;
}

export const BlueprintCard: React.FC<BlueprintCardProps> = ({ blueprint }) => (
  <section className="bg-white rounded-2xl p-8 shadow-sm border border-slate-100">
    <span className="inline-block px-3 py-1 bg-emerald-100 text-emerald-700 rounded-full text-xs font-bold uppercase tracking-wide mb-3">
      {blueprint.category}
    </span>
    <h2 className="text-3xl font-extrabold text-slate-900 mb-6">{blueprint.title}</h2>

    <div className="mb-6">
      <p className="text-xs font-semibold text-slate-500 uppercase">Upcycle Score</p>
      <p className="text-2xl font-bold text-emerald-600">{blueprint.upcycleScore}/10</p>
    </div>

    <h3 className="font-bold text-slate-800 mb-2">Material Breakdown</h3>
    <ul className="mb-6 space-y-1">
      {blueprint.materials.map((material, idx) => (
        <li key={`${material.name}-${idx}`} className="text-slate-700">
          <span className="font-semibold">{material.name}</span>: {material.quantity}
        </li>
      ))}
    </ul>

    <h3 className="font-bold text-slate-800 mb-2">Assembly Steps</h3>
    <p className="text-slate-700 whitespace-pre-line">{blueprint.assemblySummary}</p>
  </section>
);
