#!/usr/bin/env tsx
/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { program } from "commander";
import { AddBaseCommands } from "./AnnotationCLI";

program
  .name("handscribe")
  .version("0.1.0")
  .description("Annotate gesture video datasets with descriptions and command predictions.");

AddBaseCommands(program);

await program.parseAsync(process.argv);
