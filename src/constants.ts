export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'shopfloor';
export const DEFAULT_VERBOSE = false;
export const DEFAULT_DRY_RUN = false;
export const DEFAULT_DEBUG = false;
export const DEFAULT_RECURSIVE = true;
export const DEFAULT_HIERARCHICAL = false;
export const DEFAULT_ENFORCE_NAMING = false;
export const DEFAULT_AUTO_RENAME = false;
export const DEFAULT_ROOT_DIRECTORY = './';

// Wait this long after the last add/change event before a file is considered written
export const DEFAULT_DEBOUNCE_MS = 2000;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';
export const DEFAULT_WORKFLOW_DIR = `./.${PROGRAM_NAME}/workflow`;

// Audit trail, written to the organized root
export const AUDIT_LOG_FILENAME = `${PROGRAM_NAME}.log`;

export const CATEGORIES = [
    'CAD',
    'CAM',
    'NC_UNPROVEN',
    'NC_PROVEN',
    'MPI',
    'ARCHIVE',
    'HOLDING',
] as const;

export type Category = typeof CATEGORIES[number];

export const FOLDER_KEYS = [
    'CAD',
    'CAM',
    'NC_FILES',
    'NC_PROVEN',
    'NC_UNPROVEN',
    'MPI',
    'ARCHIVE',
    'HOLDING',
] as const;

export type FolderKey = typeof FOLDER_KEYS[number];

export const DEFAULT_FOLDERS: Record<FolderKey, string> = {
    CAD: 'CAD',
    CAM: 'CAM',
    NC_FILES: 'NC Files',
    NC_PROVEN: 'NC Files/PROVEN',
    NC_UNPROVEN: 'NC Files/UNPROVEN',
    MPI: 'MPI',
    ARCHIVE: 'ARCHIVE',
    HOLDING: 'HOLDING',
};

export const DEFAULT_FILE_CATEGORIES: Partial<Record<Category, string[]>> = {
    CAD: ['.step', '.stp', '.igs', '.iges', '.stl', '.dwg', '.dxf', '.catpart', '.catproduct', '.prt', '.sldprt', '.sldasm'],
    CAM: ['.mcam', '.cam', '.camproj', '.ncl', '.ncp', '.operations'],
    NC_UNPROVEN: ['.nc', '.cnc', '.tap', '.mpf', '.ngc', '.eia', '.min', '.din'],
    MPI: ['.pdf', '.doc', '.docx', '.txt', '.xlsx', '.xls'],
};

// Regex sources, matched against file names
export const DEFAULT_IGNORE_PATTERNS = [
    '^\\..*',
    '.*\\.log$',
];

// Workflow tracker
export const JOB_STATUSES = ['INTAKE', 'QUEUED', 'IN_PROGRESS', 'REVIEW', 'READY', 'COMPLETED'] as const;
export const PRIORITY_LABELS = ['', 'LOW', 'NORMAL', 'HIGH', 'URGENT'] as const;
export const DEFAULT_PRIORITY = 2;
export const MAX_ACTIVE_JOBS = 10;
export const DEFAULT_MAX_CAPACITY_PERCENT = 80;

export const SHOPFLOOR_DEFAULTS = {
    dryRun: DEFAULT_DRY_RUN,
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    recursive: DEFAULT_RECURSIVE,
    hierarchical: DEFAULT_HIERARCHICAL,
    enforceNaming: DEFAULT_ENFORCE_NAMING,
    autoRename: DEFAULT_AUTO_RENAME,
    debounceMs: DEFAULT_DEBOUNCE_MS,
    rootDirectory: DEFAULT_ROOT_DIRECTORY,
    configDirectory: DEFAULT_CONFIG_DIR,
    workflowDirectory: DEFAULT_WORKFLOW_DIR,
    folders: DEFAULT_FOLDERS,
    categories: DEFAULT_FILE_CATEGORIES,
    ignorePatterns: DEFAULT_IGNORE_PATTERNS,
};
