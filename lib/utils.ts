//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import fs from 'fs';

import type { SiteConfiguration } from '../interfaces/index.js';

export function writeTextToFile(filename: string, stringContent: string): Promise<void> {
  return new Promise((resolve, reject) => {
    return fs.writeFile(filename, stringContent, 'utf8', (error) => {
      return error ? reject(error) : resolve();
    });
  });
}

export function quitInTenSeconds(successful: boolean, config?: SiteConfiguration) {
  // To allow telemetry to flush, we'll wait typically
  if (config?.debug?.exitImmediately || process.env.EXIT_IMMEDIATELY === '1') {
    console.log(`EXIT_IMMEDIATELY set, exiting... exit code=${successful ? 0 : 1}`);
    return process.exit(successful ? 0 : 1);
  }
  console.log(`Quitting process in 10s... exit code=${successful ? 0 : 1}`);
  return setTimeout(
    () => {
      process.exit(successful ? 0 : 1);
    },
    1000 * 10 /* 10s */
  );
}
