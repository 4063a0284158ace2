import { imageLabel } from "../lib/images";
import type { RenderedImage, StageFailure } from "../types";

interface PageGalleryProps {
  images: RenderedImage[];
  selectedImageIds: string[];
  failures: StageFailure[];
  disabled: boolean;
  onToggle: (imageId: string) => void;
  onSelectAll: () => void;
  onClear: () => void;
}

export default function PageGallery({
  images,
  selectedImageIds,
  failures,
  disabled,
  onToggle,
  onSelectAll,
  onClear,
}: PageGalleryProps): JSX.Element {
  const selected = new Set(selectedImageIds);
  const failureBySubject = new Map(
    failures.map((failure) => [failure.subject, failure.message]),
  );

  if (images.length === 0) {
    return <p className="muted">Upload a menu to see its pages here.</p>;
  }

  return (
    <>
      <div className="inline-actions">
        <button type="button" onClick={onSelectAll} disabled={disabled}>
          Select All
        </button>
        <button
          type="button"
          onClick={onClear}
          disabled={disabled || selectedImageIds.length === 0}
        >
          Clear Selection
        </button>
        <span className="muted">
          {selectedImageIds.length}/{images.length} selected
        </span>
      </div>

      <div className="page-grid">
        {images.map((image) => {
          const label = imageLabel(image);
          const failure = failureBySubject.get(label);
          return (
            <label
              key={image.id}
              className={`page-card ${selected.has(image.id) ? "selected" : ""}`}
            >
              <img src={image.dataUrl} alt={label} loading="lazy" />
              <span className="checkbox">
                <input
                  type="checkbox"
                  checked={selected.has(image.id)}
                  onChange={() => onToggle(image.id)}
                  disabled={disabled}
                />
                <span>{label}</span>
              </span>
              {failure && <small className="alert error">{failure}</small>}
            </label>
          );
        })}
      </div>
    </>
  );
}
