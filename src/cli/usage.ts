export const PROGRAM_NAME = 'srt';

export const GENERAL_USAGE = `usage: ${PROGRAM_NAME} <subcommand> [args]

Available subcommands:
     merge
     shift
     shiftby
     shiftindex
     reindex
     stretch (squeeze)
     sync
     replace
     version
     help (h, ?)

Type '${PROGRAM_NAME} help <subcommand>' for help on a specific subcommand.`;

/**
 * Per-subcommand help, keyed by canonical subcommand name
 */
export const COMMAND_USAGE: Record<string, string> = {
  help: `help (h, ?): Describe the usage of this program or its subcommands.
usage: help [SUBCOMMAND]`,

  version: `version: Display the version.`,

  shiftby: `shiftby: Shift all timecodes in subtitle file(s) by a certain duration.
usage: shiftby --by="TIMECODE" [FILES]...

Valid options:
    -b "TIMECODE" [--by="TIMECODE"] : The duration, in SRT timecode format, by
                                      which to shift the subtitle file(s).
                                      Prefix with "-" to shift backwards.`,

  shift: `shift: Shift all timecodes in subtitle file(s) so that \`target' lands on \`to'.
usage: shift --target="TIMECODE" --to="TIMECODE" [FILES]...

Valid options:
    -a "TIMECODE" [--target="TIMECODE"] : The target timecode.
    -t "TIMECODE" [--to="TIMECODE"]     : The timecode the target is moved to.`,

  shiftindex: `shiftindex: Add a constant to every index in subtitle file(s).
usage: shiftindex --by="N" [FILES]...

Valid options:
    -b "N" [--by="N"] : The (possibly negative) integer to add to each index.`,

  merge: `merge: Chain subtitle files back to back, starting each one where the previous
       one ends, and renumber the result. The merged file is written to STDOUT.
usage: merge BASEFILE SECONDFILE [OTHERFILES]...`,

  stretch: `stretch (squeeze): Stretch or squeeze all timecodes in subtitle file(s) by a
                   factor.
usage: stretch --factor="FACTOR" [--anchor="TIMECODE"] [FILES]...

Valid options:
    -f "FACTOR" [--factor="FACTOR"]     : The factor by which to stretch or squeeze
                                          all timecodes.
    -a "TIMECODE" [--anchor="TIMECODE"] : The timecode that stays the same.
                                          Defaults to 00:00:00,000.`,

  sync: `sync: Make timecode \`target' become timecode \`goal' by stretching or squeezing
      around the anchor.
usage: sync --target="TIMECODE" --goal="TIMECODE" [--anchor="TIMECODE"] [FILES]...

Valid options:
    -t "TIMECODE" [--target="TIMECODE"] : The source timecode.
    -g "TIMECODE" [--goal="TIMECODE"]   : The destination timecode.
    -a "TIMECODE" [--anchor="TIMECODE"] : The timecode that stays the same.
                                          Defaults to 00:00:00,000.`,

  reindex: `reindex: Renumber all subtitles sequentially, ignoring the original indices.
usage: reindex FILES...`,

  replace: `replace: Replace a string with another string in the text of every subtitle.
usage: replace --find="STRING1" --replace-with="STRING2" [FILES]...

Valid options:
    -f "STRING1" [--find="STRING1"]         : The string to search for.
    -r "STRING2" [--replace-with="STRING2"] : The string to replace it with.`,
};
