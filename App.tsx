import React, { useEffect, useState } from 'react';
import { BlueprintCard } from './components/BlueprintCard';
import { ConceptVisualizer } from './components/ConceptVisualizer';
import { ConfigPanel } from './components/ConfigPanel';
import { FileUpload } from './components/FileUpload';
import { readImageFile } from './services/imageUtils';
import { useSession } from './store/appSession';
import { SessionPhase } from './types';
import { logger } from './utils/logger';

const App: React.FC = () => {
  const phase = useSession((s) => s.phase);
  const item = useSession((s) => s.item);
  const blueprint = useSession((s) => s.blueprint);
  const conceptImage = useSession((s) => s.conceptImage);
  const status = useSession((s) => s.lastGenerationStatus);
  const error = useSession((s) => s.error);
  const credentials = useSession((s) => s.credentials);
  const canAnalyze = useSession((s) => s.canAnalyze());
  const canRender = useSession((s) => s.canRender());
  const upload = useSession((s) => s.upload);
  const analyze = useSession((s) => s.analyze);
  const render = useSession((s) => s.render);
  const reset = useSession((s) => s.reset);
  const setCredential = useSession((s) => s.setCredential);
  const dismissError = useSession((s) => s.dismissError);

  const [previewUrl, setPreviewUrl] = useState<string | null>(null);

  // Release the preview once the item it belongs to is gone.
  useEffect(() => {
    if (!item && previewUrl) {
      URL.revokeObjectURL(previewUrl);
      setPreviewUrl(null);
    }
  }, [item, previewUrl]);

  const handleFileSelect = async (file: File) => {
    try {
      const bytes = await readImageFile(file);
      if (previewUrl) URL.revokeObjectURL(previewUrl);
      setPreviewUrl(URL.createObjectURL(file));
      upload({ name: file.name, bytes });
    } catch (e) {
      logger.error('Could not read uploaded file', e, { component: 'App' });
      alert("Error reading file");
    }
  };

  const isAnalyzing = phase === SessionPhase.ANALYZING;
  const isRendering = phase === SessionPhase.RENDERING;

  return (
    <div className="min-h-screen bg-slate-50 pb-12">
      <header className="bg-white border-b border-slate-200 sticky top-0 z-30">
        <div className="max-w-6xl mx-auto px-4 py-4 flex justify-between items-center">
          <div className="flex items-center gap-2">
            <div className="w-8 h-8 bg-emerald-600 rounded-lg flex items-center justify-center text-white font-bold">U</div>
            <h1 className="font-bold text-xl text-slate-800">Upcycle Studio</h1>
          </div>
          {item && (
            <button
              onClick={reset}
              disabled={isAnalyzing || isRendering}
              className="px-4 py-2 bg-slate-100 hover:bg-slate-200 text-slate-700 rounded-lg font-medium text-sm transition-colors disabled:opacity-50"
            >
              Upload New Image
            </button>
          )}
        </div>
      </header>

      <main className="max-w-6xl mx-auto px-4 py-8 grid grid-cols-1 lg:grid-cols-4 gap-6">
        <div className="lg:col-span-1 space-y-6">
          <ConfigPanel credentials={credentials} onChange={setCredential} />
        </div>

        <div className="lg:col-span-3 space-y-6">
          {error && (
            <div role="alert" className="bg-red-50 border border-red-200 text-red-700 rounded-xl p-4 flex justify-between items-start gap-4">
              <p>{error.message}</p>
              <button onClick={dismissError} className="text-sm font-semibold hover:underline">Dismiss</button>
            </div>
          )}

          {!item ? (
            <section className="bg-white rounded-2xl p-8 shadow-sm border border-slate-100">
              <h2 className="text-2xl font-bold text-slate-800 mb-2">Turn your discarded items into upcycled treasures.</h2>
              <FileUpload
                label="Waste photo"
                description="Upload an image of waste or trash to get started."
                previewUrl={null}
                onFileSelect={(file) => void handleFileSelect(file)}
              />
              <p className="text-sm text-slate-500 mt-4">Tip: try plastic bottles, cardboard boxes, or old furniture.</p>
            </section>
          ) : (
            <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
              <div className="space-y-6">
                <section className="bg-white rounded-2xl p-6 shadow-sm border border-slate-100">
                  <FileUpload
                    label="Current item"
                    description={item.name}
                    previewUrl={previewUrl}
                    onFileSelect={(file) => void handleFileSelect(file)}
                  />
                  {!blueprint && (
                    <div className="mt-4">
                      {credentials.geminiApiKey ? (
                        <button
                          onClick={() => void analyze()}
                          disabled={!canAnalyze}
                          className={`w-full py-4 rounded-xl font-bold text-lg shadow-lg transition-all ${
                            canAnalyze
                              ? 'bg-emerald-600 hover:bg-emerald-700 text-white cursor-pointer'
                              : 'bg-slate-200 text-slate-400 cursor-not-allowed'
                          }`}
                        >
                          {isAnalyzing ? 'Analyzing with Gemini...' : 'Analyze Image'}
                        </button>
                      ) : (
                        <p role="alert" className="text-sm text-amber-700">Please provide a Gemini API key in the sidebar.</p>
                      )}
                    </div>
                  )}
                </section>
                {blueprint && <BlueprintCard blueprint={blueprint} />}
              </div>

              {blueprint && (
                <ConceptVisualizer
                  conceptImage={conceptImage}
                  status={status}
                  canGenerate={canRender}
                  hasToken={Boolean(credentials.hfToken)}
                  isGenerating={isRendering}
                  onGenerate={() => void render()}
                />
              )}
            </div>
          )}
        </div>
      </main>
    </div>
  );
};

export default App;
