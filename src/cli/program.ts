import { Command } from 'commander';
import type { RawFlags } from '../config/options.js';
import { downloadCommand } from './commands/download.js';

export type DownloadAction = (flags: RawFlags) => Promise<number>;

export function buildProgram(version: string, action: DownloadAction = downloadCommand): Command {
  const program = new Command();

  program
    .name('drivepull')
    .description('Find a OneDrive / SharePoint folder through Microsoft Graph search and download it')
    .version(version, '-v, --version', 'Show version number')
    .option('--client_id <id>', 'Azure AD application (client) ID [env: AZURE_CLIENT_ID]')
    .option('--client_secret <secret>', 'Azure AD application client secret [env: AZURE_CLIENT_SECRET]')
    .option('--tenant_id <id>', 'Azure AD tenant ID [env: AZURE_TENANT_ID]')
    .option('--folder_name <name>', 'Name of the folder to download')
    .option('--web_url <url>', 'webUrl of the folder (from the folder details pane in OneDrive)')
    .option('--download_path <path>', 'Local directory to save the folder into (default: current directory)')
    .option('--region <code>', 'Search region for application permissions', 'IND')
    .option('--page_size <n>', 'Number of search hits to inspect', '25')
    .option('--match <policy>', 'Which hit wins when several match: first, last or unique', 'first')
    .option('--on_error <policy>', 'On a failed item: abort the run or continue with the rest', 'abort')
    .option('--verbose', 'Show every search hit and skipped item')
    .option('--quiet', 'Only show errors')
    .addHelpText('after', `
Example:
  $ drivepull --client_id <id> --client_secret <secret> --tenant_id <tenant> \\
      --folder_name Reports --web_url "https://contoso.sharepoint.com/sites/team/Shared%20Documents/Reports"
`)
    .action(async (options: RawFlags) => {
      process.exitCode = await action(options);
    });

  return program;
}
