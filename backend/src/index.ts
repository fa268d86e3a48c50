import { createApp } from './app';
import { config } from './config/env';

export { createApp } from './app';
export { Group } from './models/group';
export { Student, type ExamEntry } from './models/student';
export { loadGroup, loadGroupResult, saveGroup, type LoadResult, type LoadFailureReason } from './services/rosterService';

if (require.main === module) {
  createApp().listen(config.port, () => {
    console.log(`Roster API running on port ${config.port}, database ${config.databasePath}`);
  });
}
