export const PRODUCT_NAME = 'taskforge';

export const CLI_NAME = 'taskforge';

export const CONFIG_FILE_NAME = 'taskforge.config.json';

export const PROJECT_STATE_FILE = 'PROJECT.json';

export const PROJECT_LOCK_FILE = 'project.lock';
