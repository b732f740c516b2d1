/**
 * GenerateForm - Method text, caption, optional title and diagram type
 */

import * as React from 'react';
import { DIAGRAM_TYPES, type DiagramType, type GenerationRequest } from '../types';

interface GenerateFormProps {
  draft?: Partial<GenerationRequest>;
  busy: boolean;
}

const DIAGRAM_TYPE_LABELS: Record<DiagramType, string> = {
  methodology: 'Methodology overview',
  flowchart: 'Flowchart',
  architecture: 'Architecture',
};

export const GenerateForm: React.FC<GenerateFormProps> = ({ draft, busy }) => {
  return (
    <form className="card generate-form" method="post" action="/api/start-job">
      <label htmlFor="source_text">Method text</label>
      <textarea
        id="source_text"
        name="source_text"
        defaultValue={draft?.sourceText}
        placeholder="Our procedure consists of..."
        required
      />

      <label htmlFor="caption">Caption</label>
      <input
        id="caption"
        name="caption"
        type="text"
        defaultValue={draft?.caption}
        placeholder="Overview of the proposed workflow"
        required
      />

      <label htmlFor="title">Title (optional, used as the file name)</label>
      <input id="title" name="title" type="text" defaultValue={draft?.title} />

      <label htmlFor="diagram_type">Diagram type</label>
      <select id="diagram_type" name="diagram_type" defaultValue={draft?.diagramType ?? 'methodology'}>
        {DIAGRAM_TYPES.map((type) => (
          <option key={type} value={type}>
            {DIAGRAM_TYPE_LABELS[type]}
          </option>
        ))}
      </select>

      <button type="submit" disabled={busy}>
        {busy ? 'Generating...' : 'Generate diagram'}
      </button>
    </form>
  );
};
