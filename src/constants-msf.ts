// ─── msfconsole Output Markers ──────────────────────────────────
//
// Default marker set used to classify module output. Wording differs
// between framework releases, so every list can be extended from the
// `exploitation.markers` section of the config file.

export interface MarkerSet {
  success: RegExp[];
  failure: RegExp[];
  configurationError: RegExp[];
}

export const DEFAULT_MARKERS: MarkerSet = {
  success: [
    /\b(?:Meterpreter|Command shell|Shell|VNC|Powershell) session \d+ opened\b/i,
    /\bSession \d+ created in the background\b/i,
    /^\[\+\].*\b(?:exploit(?:ation)? (?:completed )?succe(?:ss|eded)|successfully exploited)\b/im,
  ],
  failure: [
    /Exploit completed, but no session was created/i,
    /Exploit failed\b/i,
    /Exploit aborted due to failure/i,
    /The target is not exploitable/i,
    /^\[-\].*\bnot vulnerable\b/im,
  ],
  configurationError: [
    /Msf::OptionValidateError/,
    /One or more options failed to validate/i,
    /No payload configured/i,
    /Invalid target index/i,
  ],
};

// ─── Console Protocol ───────────────────────────────────────────

export const MSF_LOAD_FAILURE = /Failed to load module|No results from search|Unknown command: use/i;

export const MSF_SEARCH_HEADER = /^\s*Matching Modules\s*$/m;

// `   0  exploit/unix/ftp/vsftpd_234_backdoor  2011-07-03  excellent  No  VSFTPD v2.3.4 Backdoor`
export const MSF_SEARCH_ROW =
  /^\s*(\d+)\s+((?:exploit|auxiliary|post|payload|encoder|nop|evasion)\/\S+)\s+(?:(\d{4}-\d{2}-\d{2})\s+)?(excellent|great|good|normal|average|low|manual)\s+(Yes|No)\s*(.*)$/i;

export const MSF_SEARCH_INDEX_ROW = /^\s*\d+\s+\S/;

// msf 6.3+ lists module targets as indented sub-rows under their module.
export const MSF_SEARCH_SUBROW = /^\s*\d+\s+\\_\s/;

export const MSF_RUN_COMMAND = 'run -z';

export const MSF_SESSION_LIST_COMMAND = 'sessions -l';

export const SENTINEL_PREFIX = '__NETSTRIKE_DONE_';

export const ANSI_ESCAPE = /\x1b\[[0-9;?]*[A-Za-z]/g;
