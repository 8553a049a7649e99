import { stdio } from '@conduit/duplex'
import { echoLine } from './echo'

async function main(): Promise<void> {
    try {
        await echoLine(stdio())
    } finally {
        // Stop reading, so that the process can exit.
        process.stdin.destroy()
    }
}

main().catch((error: Error) => {
    console.error(error)
    process.exitCode = 1
})
