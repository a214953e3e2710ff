/**
 * Constants for FieldSign
 */

// On-media update package layout
/** Package directory name directly under the mount root */
export const PACKAGE_DIR_NAME = 'signage_update_package';

/** Configuration document name inside a package (and in the live engine dir) */
export const CONFIG_FILE = 'config.json';

/** Asset tree directory name inside a package */
export const PACKAGE_ASSETS_DIR = 'assets';

/** Path prefix that marks a media path as package-relative */
export const ASSET_PREFIX = `${PACKAGE_ASSETS_DIR}/`;

// Live application layout
/** Engine directory under the app root (holds the live config.json) */
export const DEFAULT_ENGINE_DIR = 'engine';

/** Live asset directory under the engine directory */
export const DEFAULT_ASSET_SUBDIR = 'image_sets';

/** Staging directory name under the app root */
export const STAGING_DIR_NAME = '.update_staging';

/** Backup snapshot directory name under the app root */
export const BACKUP_DIR_NAME = '.update_backup';

/** Suffix appended to backed-up config file and asset directory names */
export const BACKUP_SUFFIX = '.bak';

/** Snapshot manifest file name inside the backup directory */
export const SNAPSHOT_MANIFEST_FILE = 'snapshot.json';

// Removable media
/** Base directory for mount points created by the updater */
export const DEFAULT_MOUNT_BASE = '/mnt/signage_usb_update';

/** Block device listing command */
export const LSBLK_PATH = '/usr/bin/lsblk';

/** Mount command */
export const MOUNT_PATH = '/usr/bin/mount';

/** Unmount command */
export const UMOUNT_PATH = '/usr/bin/umount';

// Configuration document
export const CONFIG_SECTIONS = ['buttons', 'media', 'actions', 'settings'] as const;

export const BUTTON_MODES = ['press', 'toggle'] as const;

export const MEDIA_MODES = ['image_still', 'image_flash', 'scroll_text', 'slide'] as const;

export const ACTION_MODES = ['hdmi_control', 'load_config'] as const;

/**
 * Settings filled in when absent from a loaded live configuration
 */
export const SETTINGS_DEFAULTS = {
  debounce_time: 0.5,
  poll_interval: 0.05,
  default_combo_hold_time: 1.0,
} as const;
