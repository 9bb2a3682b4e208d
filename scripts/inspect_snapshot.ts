import { fileURLToPath } from 'url';
import { createSnapshotService } from '../services/snapshotService.js';
import { settingsService } from '../services/settingsService.js';

export interface SnapshotSummary {
  users: number;
  credentialedUsers: number;
  messages: number;
  firstTimestamp: number | null;
  lastTimestamp: number | null;
}

export async function summarizeSnapshot(usersFile: string, messagesFile: string): Promise<SnapshotSummary> {
  const snapshot = createSnapshotService({ usersFile, messagesFile });
  // No hasher: inspection only needs the stored entries
  const { directory, messageLog } = await snapshot.load({ hasher: null });

  const credentials = Object.values(directory.toRecord());
  return {
    users: directory.size,
    credentialedUsers: credentials.filter((credential) => credential !== null).length,
    messages: messageLog.size,
    firstTimestamp: messageLog.firstTimestamp ?? null,
    lastTimestamp: messageLog.lastTimestamp ?? null,
  };
}

async function main() {
  const { usersFile, messagesFile } = settingsService.getServerSettings();
  console.log(`Inspecting ${usersFile} and ${messagesFile}...`);
  const summary = await summarizeSnapshot(usersFile, messagesFile);
  console.log(JSON.stringify(summary, null, 2));
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error('Error:', error);
    process.exit(1);
  });
}
