import React from 'react';

export const ACCEPTED_UPLOAD_TYPES = 'image/jpeg,image/png';

interface FileUploadProps {
  label: string;
  description: string;
  previewUrl: string | null;
  onFileSelect: (file: File) => void;
}

export const FileUpload: React.FC<FileUploadProps> = ({
  label,
  description,
  previewUrl,
  onFileSelect
}) => {
  const handleInputChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (file) {
      onFileSelect(file);
    }
    // Allow picking the same file again after a reset.
    e.target.value = '';
  };

  const handleDrop = (e: React.DragEvent<HTMLLabelElement>) => {
    e.preventDefault();
    const file = e.dataTransfer.files[0];
    if (file) {
      onFileSelect(file);
    }
  };

  return (
    <div className="w-full">
      <p className="block text-sm font-semibold text-slate-700 mb-1">{label}</p>
      <p className="text-xs text-slate-500 mb-2">{description}</p>

      {previewUrl ? (
        <div className="relative rounded-xl overflow-hidden shadow-sm border border-slate-200">
          <img
            src={previewUrl}
            alt="Uploaded item"
            className="w-full h-64 object-contain bg-slate-100"
          />
        </div>
      ) : (
        <label
          onDragOver={(e) => e.preventDefault()}
          onDrop={handleDrop}
          className="flex flex-col items-center justify-center w-full h-64 border-2 border-slate-300 border-dashed rounded-xl cursor-pointer bg-slate-50 hover:bg-emerald-50 hover:border-emerald-500 transition-colors"
        >
          <div className="flex flex-col items-center justify-center pt-5 pb-6">
            <svg className="w-8 h-8 mb-3 text-slate-400" fill="none" stroke="currentColor" viewBox="0 0 24 24" xmlns="http://www.w3.org/2000/svg">
              <path strokeLinecap="round" strokeLinejoin="round" strokeWidth="2" d="M7 16a4 4 0 01-.88-7.903A5 5 0 1115.9 6L16 6a5 5 0 011 9.9M15 13l-3-3m0 0l-3 3m3-3v12"></path>
            </svg>
            <p className="text-sm text-slate-500"><span className="font-semibold">Click to upload</span> or drag and drop</p>
            <p className="text-xs text-slate-400 mt-1">JPEG, PNG</p>
          </div>
          <input
            type="file"
            className="hidden"
            accept={ACCEPTED_UPLOAD_TYPES}
            aria-label={label}
            onChange={handleInputChange}
          />
        </label>
      )}
    </div>
  );
};
