#!/usr/bin/env tsx
import { program } from "@commands/program"

await program.parseAsync()
