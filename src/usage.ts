export const usage = `Usage: monitor-mode [options] <command> [command options]

Manage monitor selection in GNOME and Cinnamon Wayland sessions.

Commands:
  status [--modes, -m]      Show the current monitor configuration (--modes lists display modes)
  external [pattern]        Use only the external monitors
  internal [pattern]        Use only the internal monitor
  join [pattern]            Place internal and external monitors side by side
  mirror [pattern]          Mirror all monitors at their highest common resolution
  test <pattern>            Show which connected monitors a pattern matches
  auto, rules               Apply the first rule that matches the connected monitors
      --name, -n NAME       Descriptive name for this rule set
      --mirror PATTERN      Mirror when PATTERN matches (repeatable)
      --join PATTERN        Join when PATTERN matches (repeatable)
      --external PATTERN    Use the external monitors when PATTERN matches (repeatable)
      --internal PATTERN    Use the internal monitor when PATTERN matches (repeatable)
      --default MODE        Mode used when no pattern matches (default: external)

Pattern options:
  --connector X             Exact match by connector name (e.g. DP-6, HDMI-1)
  --vendor X                Exact match by vendor code (e.g. ACR, DEL)
  --product X               Substring match by product name
  --serial X                Substring match by serial number
  --name X                  Substring match by display name

A PATTERN given to auto is "field=value" (connector, vendor, product, serial or name);
anything else matches by display name.

Options:
  --help, -h                Show this help message
  --version                 Show version number
  --watch, -w               Keep running and re-apply the rules when monitors change
  --test, -t                Dry run: print what would be done without making changes
  --persistent, -P          Store the applied layout instead of applying it temporarily
  --log-level, -l           Log level (silent, error, log, debug, verbose)
  --verbose, -v             More logging (-v debug, -vv verbose)
  --log-file, -f            Append log output to a file
  --desktop                 Desktop to talk to (auto, gnome, cinnamon)
`;
