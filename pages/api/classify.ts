// pages/api/classify.ts
import { createClassifyHandler } from '../../lib/handlers';
import { getServices } from '../../lib/services';

/**
 * POST /api/classify { "product_name": "..." }
 * Returns { commodity_code, description, reasoning } for programmatic callers.
 */
export default createClassifyHandler(getServices);
