export function printHelp() {
    console.log(`
Usage:
  waterline run [--config <file>] [--data <file>] [--host 127.0.0.1] [--port 3000] [--tz <zone>]
                [--tariff <n>] [--threshold <L/min>] [--units metric|imperial] [--demo]
                [--save-interval <s>] [-v|-vv]
  waterline status [--config <file>] [--data <file>] [--tz <zone>] [--json]
  waterline help

Commands:
  run                    Start the meter service and its HTTP API
  status                 Print a summary of the stored meter state (offline)
  help                   Show this message

Options:
  --config <file>        JSON config file (default: ./waterline.config.json)
  --data <file>          State file (default: ./data/waterline.json)

  --host <host>          HTTP bind address (default: 127.0.0.1)
  --port <port>          HTTP port (default: 3000)

  --tz <zone>            IANA time zone for period boundaries (default: system zone)
  --tariff <n>           Price per m³ (metric) or per US gallon (imperial) (default: 0)
  --threshold <L/min>    Leak threshold on the 24h minimum flow (default: 0)
  --units <system>       metric | imperial (default: metric)

  --demo                 Feed the service with synthetic readings
  --save-interval <s>    Seconds between state saves (default: 300)

  --json                 Print JSON output (machine-readable)
  -v / --verbose         Log HTTP requests
  -vv / --debug          Also log period finalizations and store activity
  --quiet                No service log lines
`);
}
