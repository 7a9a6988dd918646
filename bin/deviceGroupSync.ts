#!/usr/bin/env node
//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import '../jobs/deviceGroupSync/index.js';
