//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { promises as fs } from 'fs';
import objectPath from 'object-path';
import path from 'path';

export type ConfigurationGraphOptions = {
  requireConfigurationDirectory?: boolean;
  treatErrorsAsWarnings?: boolean;
};

async function jsonProcessor(p: string): Promise<unknown> {
  const raw = await fs.readFile(p, 'utf8');
  return JSON.parse(raw);
}

// Each JSON file in the directory becomes the configuration node of the same
// name: graph.json is config.graph. The *.types.ts files are skipped.
export default async function buildConfigurationGraph(
  dirPath: string,
  options?: ConfigurationGraphOptions
): Promise<Record<string, unknown>> {
  const treatErrorsAsWarnings = options?.treatErrorsAsWarnings || false;
  const config: Record<string, unknown> = {};
  let files: string[] = [];
  try {
    files = await fs.readdir(dirPath);
  } catch (directoryError) {
    if (options?.requireConfigurationDirectory) {
      throw directoryError;
    }
  }
  for (const filename of files.sort()) {
    const file = path.join(dirPath, filename);
    const ext = path.extname(file);
    const nodeName = path.basename(file, ext);
    if (ext !== '.json') {
      continue;
    }
    try {
      let value = await jsonProcessor(file);
      if (value !== undefined) {
        const existing: unknown = objectPath.get(config, nodeName);
        if (existing && typeof existing === 'object' && value && typeof value === 'object') {
          value = { ...existing, ...value };
        }
        objectPath.set(config, nodeName, value);
      }
    } catch (ex) {
      console.warn(`Configuration graph: problem processing ${file}`);
      if (!treatErrorsAsWarnings) {
        throw ex;
      }
      console.warn(ex);
    }
  }
  return config;
}
