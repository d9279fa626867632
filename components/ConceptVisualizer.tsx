import React from 'react';
import { ConceptImage, GenerationStatus } from '../types';

interface ConceptVisualizerProps {
  conceptImage: ConceptImage | null;
  status: GenerationStatus;
  canGenerate: boolean;
  hasToken: boolean;
  isGenerating: boolean;
  onGenerate: () => void;
}

export const ConceptVisualizer: React.FC<ConceptVisualizerProps> = ({
  conceptImage,
  status,
  canGenerate,
  hasToken,
  isGenerating,
  onGenerate
}) => (
  <section className="bg-white rounded-2xl p-6 shadow-sm border border-slate-100">
    <h3 className="font-bold text-slate-800 mb-4">Visualization</h3>

    {hasToken ? (
      <button
        onClick={onGenerate}
        disabled={!canGenerate}
        className={`w-full py-3 rounded-xl font-bold shadow transition-colors ${
          canGenerate
            ? 'bg-emerald-600 hover:bg-emerald-700 text-white cursor-pointer'
            : 'bg-slate-200 text-slate-400 cursor-not-allowed'
        }`}
      >
        {isGenerating ? 'Dreaming up the design...' : conceptImage ? 'Regenerate Concept Image' : 'Generate Concept Image'}
      </button>
    ) : (
      <p role="alert" className="text-sm text-amber-700">Enter a Hugging Face token in the sidebar to generate images.</p>
    )}

    {status === 'failed' && (
      <p role="alert" className="mt-4 text-sm text-red-600">Generation failed. Check your Hugging Face token or internet connection.</p>
    )}
    {status === 'noPrompt' && (
      <p role="alert" className="mt-4 text-sm text-amber-700">No visualization prompt is available. Analyze the image first.</p>
    )}

    {conceptImage && (
      <figure className="mt-4">
        <img src={conceptImage.dataUrl} alt="AI generated concept" className="w-full rounded-xl border border-slate-200" />
        <figcaption className="text-xs text-slate-500 mt-1 text-center">AI Generated Concept</figcaption>
      </figure>
    )}
  </section>
);
