#!/usr/bin/env node

import * as fs from 'fs'
import {promisify} from 'util'
import {runCli} from './cli'

runCli(process.argv.slice(2), {
	readFile: promisify(fs.readFile),
	log: message => console.log(message),
	error: message => console.error(message)
})
	.then(exitCode => {
		process.exitCode = exitCode
	})
