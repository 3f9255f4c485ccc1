import type { FormDefinition } from './types.js';

export const FORM_DEFINITIONS: FormDefinition[] = [
  {
    id: '10-k',
    form_type: '10-K',
    display_name: 'Annual report (10-K)',
    directory: '10-k',
    file_label: '10K',
    command: 'download_10k',
  },
  {
    id: '10-q',
    form_type: '10-Q',
    display_name: 'Quarterly report (10-Q)',
    directory: '10-q',
    file_label: '10Q',
    command: 'download_10q',
  },
  {
    // EDGAR files 13-F holdings reports as "13F-HR"
    id: '13-f',
    form_type: '13F-HR',
    display_name: 'Institutional holdings report (13F-HR)',
    directory: '13-f',
    file_label: '13F',
    command: 'download_13f',
  },
];

export function getFormDefinition(id: string): FormDefinition | undefined {
  const key = id.toLowerCase();
  return FORM_DEFINITIONS.find(f => f.id === key || f.form_type.toLowerCase() === key);
}

export function requireFormDefinition(id: string): FormDefinition {
  const form = getFormDefinition(id);
  if (!form) {
    throw new Error(`Unsupported form type: "${id}". Supported: ${FORM_DEFINITIONS.map(f => f.form_type).join(', ')}`);
  }
  return form;
}
