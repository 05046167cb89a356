// pages/api/process.ts
// Served at POST /process through the rewrite in next.config.ts
import { createProcessHandler } from '../../lib/handlers';
import { getServices } from '../../lib/services';

export default createProcessHandler(getServices);
