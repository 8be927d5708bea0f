#!/usr/bin/env node

import { runMain } from "citty"

import { start } from "./start"

void runMain(start)
