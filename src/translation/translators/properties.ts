/**
 * Property expression translators
 */

import type { ObjectPropertyExpression } from '../../types/model.js';
import { createInverseProperty } from '../../model/factory.js';
import { termKey } from '../../model/terms.js';
import { OWL } from '../../vocab/index.js';
import { required } from '../dependency.js';
import { typeTriples, type Translator } from './common.js';

export const inverseObjectProperty: Translator<ObjectPropertyExpression> = {
    kind: 'InverseObjectProperty',
    guard: (node, ctx) => ctx.store.has(node, OWL.inverseOf),
    build: (node, ctx) => {
        const triple = ctx.store.singletonTriple(node, OWL.inverseOf);
        const property = required(ctx.resolver.resolveObjectProperty(triple.object), termKey(node));
        ctx.consume([triple, ...typeTriples(node, ctx, OWL.ObjectProperty)]);
        return createInverseProperty(property);
    },
};
