/**
 * Looseleaf Lit-HTML Integration
 * ==============================
 *
 * Renders models with lit-html and keeps the DOM in step with later writes.
 *
 * - `createModelView` re-renders a whole template on every change
 * - `fieldText` renders a single field as text and updates only that part
 */

import { html, render, type Part, type TemplateResult } from 'lit-html'
import { AsyncDirective } from 'lit-html/async-directive.js'
import { directive, type DirectiveParameters } from 'lit-html/directive.js'

import type { ModelInstance, ModelValue } from './index'

// =============================================================================
// CORE VIEW TYPES
// =============================================================================

/**
 * Template function receiving the model and the view context.
 */
export type ModelTemplate = (model: ModelInstance, context: ViewContext) => TemplateResult

export interface ViewContext {
  readonly model: ModelInstance
  onUnmount(callback: () => void): void
}

export interface ModelView {
  readonly model: ModelInstance
  readonly container: HTMLElement
  readonly mounted: boolean
  render(): void
  destroy(): void
  updateTemplate(template: ModelTemplate): void
}

export type ValueFormatter = (value: ModelValue) => string

const asText: ValueFormatter = value => value.string

// =============================================================================
// REACTIVE VIEW BINDING
// =============================================================================

export function createModelView(
  model: ModelInstance,
  container: HTMLElement,
  template: ModelTemplate
): ModelView {
  let currentTemplate = template
  let isMounted = false
  let isDestroyed = false
  const cleanupCallbacks = new Set<() => void>()

  const context: ViewContext = {
    model,
    onUnmount: callback => {
      cleanupCallbacks.add(callback)
    }
  }

  const renderView = () => {
    if (isDestroyed) return
    try {
      render(currentTemplate(model, context), container)
      isMounted = true
    } catch (error) {
      console.error(`[Looseleaf] Error rendering view for model "${model.name}".`, error)
      render(html`<div data-render-error>Render Error: ${String(error)}</div>`, container)
    }
  }

  cleanupCallbacks.add(model.onChange(renderView))

  const view: ModelView = {
    model,
    container,
    get mounted() {
      return isMounted
    },
    render: renderView,
    destroy: () => {
      if (isDestroyed) return
      isDestroyed = true
      isMounted = false
      cleanupCallbacks.forEach(cleanup => cleanup())
      cleanupCallbacks.clear()
      render(html``, container)
    },
    updateTemplate: next => {
      currentTemplate = next
      renderView()
    }
  }

  renderView()
  return view
}

// =============================================================================
// DIRECTIVES
// =============================================================================

/**
 * Text of one field, kept current while the part is connected.
 *
 * @example
 * html`<span>${fieldText(store.models.login, 'profile.displayName')}</span>`
 */
class FieldTextDirective extends AsyncDirective {
  private model?: ModelInstance
  private path = ''
  private format: ValueFormatter = asText
  private unsubscribe?: () => void

  render(model: ModelInstance, path: string, format: ValueFormatter = asText): string {
    return format(model.at(path))
  }

  override update(_part: Part, [model, path, format = asText]: DirectiveParameters<this>): string {
    if (model !== this.model) {
      this.unsubscribe?.()
      this.unsubscribe = undefined
      this.model = model
      if (this.isConnected) this.subscribe()
    }
    this.path = path
    this.format = format
    return this.render(model, path, format)
  }

  protected override disconnected(): void {
    this.unsubscribe?.()
    this.unsubscribe = undefined
  }

  protected override reconnected(): void {
    this.subscribe()
  }

  private subscribe(): void {
    const model = this.model
    if (!model) return
    this.unsubscribe = model.onChange(() => {
      this.setValue(this.format(model.at(this.path)))
    })
  }
}

export const fieldText = directive(FieldTextDirective)
