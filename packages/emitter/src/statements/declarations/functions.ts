/**
 * Function declaration emission
 */

import {
  INITIALIZER_NAME,
  SELF_NAME,
  type AstFunctionDef,
} from "@retarget/frontend";
import type { EmitterContext } from "../../types.js";
import { renderStatement } from "../../core/template.js";
import { formatVariable } from "../../expressions/identifiers.js";
import { emitBlock } from "../blocks.js";

/**
 * Emit a function declaration, or a method when emitted inside a class body.
 *
 * In a method the leading receiver parameter is dropped and replaced by the
 * profile's receiver parameter, if the target spells one. The initializer
 * takes the profile's constructor form.
 */
export const emitFunctionDeclaration = (
  stmt: AstFunctionDef,
  context: EmitterContext
): [string, EmitterContext] => {
  const { profile, className } = context;
  const { functions } = profile;

  const inClass = className !== undefined;
  const isInitializer = inClass && stmt.name === INITIALIZER_NAME;
  const params =
    inClass && stmt.params[0] === SELF_NAME ? stmt.params.slice(1) : stmt.params;

  const receiverTemplate = !inClass
    ? null
    : isInitializer
      ? functions.initializerSelfParameter
      : functions.selfParameter;
  const receiver =
    receiverTemplate === null
      ? []
      : [renderStatement(receiverTemplate, { class: className ?? "" })];

  const allParams = [
    ...receiver,
    ...params.map((param) =>
      renderStatement(functions.parameter, {
        name: formatVariable(profile, param),
      })
    ),
  ].join(", ");

  const template = isInitializer
    ? functions.initializer
    : inClass
      ? functions.method
      : functions.declaration;

  const header = renderStatement(template, {
    keyword: profile.keywords.function,
    name: stmt.name,
    params: allParams,
    class: className ?? "",
  });

  const prologue =
    functions.parameterPrologue !== null && allParams !== ""
      ? [renderStatement(functions.parameterPrologue, { params: allParams })]
      : [];

  return emitBlock(
    {
      header,
      body: stmt.body,
      scope: { scopes: [new Set(params)], className: undefined },
      prologue,
    },
    context
  );
};
