import { createPlaceholderManifest, type PackageManifest } from '@valscope/core';

const manifestDefinition = {
  name: '@valscope/printer',
  summary:
    'Classifies tagged runtime value words and renders them as indentation-aware, optionally coloured text.',
} as const satisfies PackageManifest;

export const manifest = createPlaceholderManifest(manifestDefinition);
