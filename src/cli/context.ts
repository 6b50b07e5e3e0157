/**
 * What every command receives once the workspace is located
 */

import { WorkspaceConfig } from './settings';

export interface CliConfig {
    workspace: WorkspaceConfig;
    defaultProject?: string;
}
