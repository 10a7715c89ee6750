/**
 * Shared sources and hand-traced streams for the tests
 */

/** Four atoms: stream start, object, attribute, stream end */
export const ROOM_SOURCE = [
  'uni_start_stream <00x>',
  'man_start_object <independent, "Test">',
  'mat_object_id <32-1>',
  'uni_end_stream <00x>',
  '',
].join('\n');

export const ROOM_DEBUG_HEX =
  '00 01 ' +
  '00 01 00 00 01 00 ' +
  '01 00 00 00 08 00 01 00 04 54 65 73 74 ' +
  '10 02 00 00 08 00 00 00 20 00 00 00 01 ' +
  '00 02 00 00 01 00';

export const ROOM_PRODUCTION_HEX =
  '40 01 ' +
  '00 01 01 00 ' +
  '01 00 05 01 54 65 73 74 ' +
  '10 02 02 20 01 ' +
  '00 02 01 00';

/** A nested attribute: exercises depth changes and empty records */
export const NESTED_SOURCE = [
  'uni_start_stream',
  '  mat_bool_force_scroll <yes>',
  'uni_end_stream',
  '',
].join('\n');

export const NESTED_DEBUG_HEX = '00 01 00 01 00 00 00 10 20 01 00 02 00 01 00 02 00 00 00';
export const NESTED_PRODUCTION_HEX = '40 01 40 01 90 20 01 01 01 c0 02 00';

/** Consecutive atoms of one protocol, including an atom number above 30 */
export const RUN_SOURCE = [
  'uni_start_stream',
  'mat_orientation <vcf>',
  'mat_bool_force_scroll <yes>',
  'mat_width <300>',
  'uni_end_stream',
  '',
].join('\n');

export const RUN_DEBUG_HEX =
  '00 01 ' +
  '00 01 00 00 00 ' +
  '10 00 00 00 02 00 16 ' +
  '10 20 00 00 02 00 01 ' +
  '10 14 00 00 04 00 00 01 2c ' +
  '00 02 00 00 00';

export const RUN_PRODUCTION_HEX = '40 01 40 01 10 00 01 16 3f 20 01 01 34 02 42 58 40 02';

/** An object holding an action with its own stream; arguments in canonical form */
export const ACTION_SOURCE = [
  'uni_start_stream <00x>',
  '  man_start_object <trigger, "OK">',
  '    mat_title <"Go">',
  '    mat_size <10, 20>',
  '    act_replace_select_action',
  '      uni_start_stream',
  '        sm_send_k1 <8-50934>',
  '        var_string_set <a, "say \\"hi\\"">',
  '        idb_append_data <01x, 02x, ffx>',
  '      uni_end_stream',
  '  man_end_object',
  'uni_end_stream <00x>',
  '',
].join('\n');
