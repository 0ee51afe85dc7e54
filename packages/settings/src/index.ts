import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  validateColorFieldConfig,
  type ColorFieldConfig,
  type FocusPointConfig
} from '@huefield/color-field';

const CONFIG_SCHEMA_VERSION = '1.0.0';
const CONFIG_FILE_NAME = 'field-config.json';

interface ConfigFileShape {
  version: string;
  data: Partial<ColorFieldConfig>;
}

export const defaultFieldConfig = (): ColorFieldConfig => ({
  focusPoints: [
    {
      id: 'red',
      centerXFraction: 0.1,
      centerYFraction: 0.9,
      radiusPixels: 200,
      targetHueDegrees: 0,
      saturationSign: 1,
      lightnessSign: 1
    },
    {
      id: 'blue',
      centerXFraction: 0.9,
      centerYFraction: 0.1,
      radiusPixels: 200,
      targetHueDegrees: 240,
      saturationSign: -1,
      lightnessSign: -1
    }
  ],
  maxHueShiftDegrees: 30,
  maxSaturationAdjust: 0.2,
  maxLightnessAdjust: 0.1,
  secondaryMixFactor: 0.5
});

export class SettingsValidationError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${message}: ${filePath}`, options);
    this.name = 'SettingsValidationError';
  }
}

export const isSettingsValidationError = (error: unknown): error is SettingsValidationError =>
  error instanceof SettingsValidationError;

export const getConfigDirectory = (): string =>
  process.env.HUEFIELD_CONFIG_DIR ?? path.join(os.homedir(), '.huefield');

export const getConfigFilePath = (): string =>
  process.env.HUEFIELD_CONFIG_FILE ?? path.join(getConfigDirectory(), CONFIG_FILE_NAME);

// Non-array input is passed through for validation to reject
const cloneFocusPoints = (focusPoints: FocusPointConfig[]): FocusPointConfig[] =>
  Array.isArray(focusPoints) ? focusPoints.map(focus => ({ ...focus })) : focusPoints;

/**
 * Overlay partial settings on a base configuration.
 * A provided `focusPoints` list replaces the base list wholesale.
 */
export const mergeFieldConfig = (
  base: ColorFieldConfig,
  overrides: Partial<ColorFieldConfig> | null | undefined
): ColorFieldConfig => ({
  ...base,
  ...overrides,
  focusPoints: cloneFocusPoints(overrides?.focusPoints ?? base.focusPoints)
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const serialize = (config: ColorFieldConfig): string =>
  JSON.stringify(
    {
      version: CONFIG_SCHEMA_VERSION,
      data: config
    } satisfies ConfigFileShape,
    null,
    2
  );

async function readConfigFile(filePath: string): Promise<ConfigFileShape | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }

    throw new SettingsValidationError(filePath, 'Failed to read the configuration file', { cause: error });
  }

  let parsed: ConfigFileShape;
  try {
    parsed = JSON.parse(raw) as ConfigFileShape;
  } catch (error) {
    throw new SettingsValidationError(filePath, 'Configuration file is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed) || !isRecord(parsed.data)) {
    throw new SettingsValidationError(filePath, 'Configuration file must contain a "data" object');
  }

  // Field-level checks happen in validateColorFieldConfig after the merge
  return parsed;
}

/**
 * Load the color field configuration.
 * A missing file yields the defaults; partial files are merged over them.
 *
 * @throws SettingsValidationError when the file cannot be read or parsed
 * @throws ConfigurationError when the merged configuration is invalid
 */
export async function loadFieldConfig(filePath = getConfigFilePath()): Promise<ColorFieldConfig> {
  const stored = await readConfigFile(filePath);
  const config = mergeFieldConfig(defaultFieldConfig(), stored?.data);
  validateColorFieldConfig(config);
  return config;
}

export async function saveFieldConfig(
  config: ColorFieldConfig,
  filePath = getConfigFilePath()
): Promise<ColorFieldConfig> {
  validateColorFieldConfig(config);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serialize(config), 'utf-8');
  return config;
}

export async function configFileExists(filePath = getConfigFilePath()): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
