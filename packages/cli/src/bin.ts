#!/usr/bin/env -S node --import tsx
import { main } from './index.js'

await main(process.argv)
