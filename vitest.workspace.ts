import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
    'packages/portcheck-core',
    'packages/portcheck-cli',
]);
