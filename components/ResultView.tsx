import React from 'react';
import { Download, Image as ImageIcon } from 'lucide-react';
import type { BasketItem, TryOnOutcome } from '../types';

interface ResultViewProps {
  garment: BasketItem;
  results: TryOnOutcome[];
  isLoading: boolean;
  progress: string;
}

const ResultView: React.FC<ResultViewProps> = ({ garment, results, isLoading, progress }) => {
  if (results.length === 0) {
    return (
      <div className="tryon-result tryon-result-empty">
        {isLoading ? (
          <>
            <div className="tryon-spinner" />
            <p className="tryon-muted">{progress || 'Generating…'}</p>
          </>
        ) : garment.url ? (
          <img className="tryon-result-image" src={garment.url} alt={garment.name} />
        ) : (
          <>
            <ImageIcon size={32} />
            <p className="tryon-muted">Your look will appear here</p>
          </>
        )}
      </div>
    );
  }

  // 单件直接大图展示，多件按网格带标签
  if (results.length === 1) {
    const [only] = results;
    return (
      <div className="tryon-result">
        <img className="tryon-result-image" src={only.imageUrl} alt={`Try-on result: ${only.item.name}`} />
        <a className="tryon-link" href={only.imageUrl} download target="_blank" rel="noreferrer">
          <Download size={14} /> Download
        </a>
      </div>
    );
  }

  return (
    <div className="tryon-result-grid">
      {results.map(({ imageUrl, item }) => (
        <figure key={item.url} className="tryon-result-cell">
          <img src={imageUrl} alt={`Try-on result: ${item.name}`} />
          <figcaption>
            {item.name}
            {item.price ? <span className="tryon-price"> {item.price}</span> : null}
          </figcaption>
        </figure>
      ))}
    </div>
  );
};

export default ResultView;
